import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { Identity } from './identity.entity';
import {
  DISPLAY_CODE_GENERATOR,
  DisplayCodeGenerator,
  displayCodeBucket,
} from './display-code.generator';
import {
  GalleryMatch,
  IDENTITY_MATCHER,
  IdentityMatcher,
} from './identity-matcher';
import { Embedding } from '../comparator/embedding-comparator';
import { FaceAttributes } from '../analyzer/face-analysis';
import { Clock, CLOCK } from '../shared/clock';
import { IdentityCodeCollisionError } from '../shared/errors';

export const MAX_CODE_DRAWS = 10;

/**
 * Owns every registered identity. `insert` and `recordMatch` are the only
 * mutations; the registration engine calls them inside its critical section
 * and passes its transaction manager along.
 */
@Injectable()
export class GalleryService {
  private readonly logger = new Logger('Gallery');

  constructor(
    @InjectRepository(Identity)
    private identityRepository: Repository<Identity>,
    @Inject(DISPLAY_CODE_GENERATOR) private codeGenerator: DisplayCodeGenerator,
    @Inject(IDENTITY_MATCHER) private matcher: IdentityMatcher,
    @Inject(CLOCK) private clock: Clock,
  ) {}

  private repository(manager?: EntityManager): Repository<Identity> {
    return manager ? manager.getRepository(Identity) : this.identityRepository;
  }

  async bestMatch(
    query: Embedding,
    threshold: number,
    manager?: EntityManager,
  ): Promise<GalleryMatch | null> {
    const identities = await this.repository(manager).find({
      select: {
        identityId: true,
        firstSeen: true,
        representativeEmbedding: true,
      },
    });

    return this.matcher.bestMatch(
      query,
      identities.map((identity) => ({
        identityId: identity.identityId,
        firstSeen: identity.firstSeen,
        embedding: identity.representativeEmbedding,
      })),
      threshold,
    );
  }

  async insert(
    embedding: Embedding,
    attributes: FaceAttributes,
    manager?: EntityManager,
  ): Promise<Identity> {
    const repository = this.repository(manager);
    const now = this.clock.now();
    const displayCode = await this.drawDisplayCode(repository, now);

    const identity = repository.create({
      identityId: uuidv4(),
      displayCode,
      representativeEmbedding: [...embedding],
      firstSeen: now,
      lastSeen: now,
      totalDetections: 1,
      confidenceAverage: null,
      ageEstimate: attributes.age,
      genderEstimate: attributes.gender?.dominant ?? null,
    });
    const saved = await repository.save(identity);
    this.logger.log(`Registered ${saved.displayCode} (${saved.identityId})`);
    return saved;
  }

  async recordMatch(
    identityId: string,
    score: number,
    manager?: EntityManager,
  ): Promise<Identity> {
    const repository = this.repository(manager);
    const identity = await repository.findOneByOrFail({ identityId });

    identity.lastSeen = this.clock.now();
    identity.totalDetections += 1;

    // The registration event is excluded, so matches = detections - 1.
    const matches = identity.totalDetections - 1;
    identity.confidenceAverage =
      identity.confidenceAverage === null
        ? score
        : identity.confidenceAverage +
          (score - identity.confidenceAverage) / matches;

    return repository.save(identity);
  }

  async findById(identityId: string): Promise<Identity | null> {
    return this.identityRepository.findOneBy({ identityId });
  }

  async findByDisplayCode(displayCode: string): Promise<Identity | null> {
    return this.identityRepository.findOneBy({ displayCode });
  }

  async list(): Promise<Identity[]> {
    return this.identityRepository.find({ order: { lastSeen: 'DESC' } });
  }

  async count(): Promise<number> {
    return this.identityRepository.count();
  }

  async mostSeen(): Promise<Identity | null> {
    const [top] = await this.identityRepository.find({
      order: { totalDetections: 'DESC', firstSeen: 'ASC' },
      take: 1,
    });
    return top ?? null;
  }

  private async drawDisplayCode(
    repository: Repository<Identity>,
    timestamp: Date,
  ): Promise<string> {
    for (let draw = 0; draw < MAX_CODE_DRAWS; draw++) {
      const displayCode = this.codeGenerator.generate(timestamp);
      const taken = await repository.existsBy({ displayCode });
      if (!taken) return displayCode;
      this.logger.warn(`Display code ${displayCode} already taken`);
    }
    throw new IdentityCodeCollisionError(displayCodeBucket(timestamp));
  }
}

import 'reflect-metadata';
import { Test, TestingModule } from '@nestjs/testing';
import { RegistrationModule } from './registration.module';
import { RegistrationService } from './registration.service';
import { OutcomeNotifierService } from './outcome-notifier.service';
import { RegistrationOutcome } from './registration-outcome';
import {
  FACE_ANALYZER,
  FaceAnalysis,
  FaceAnalyzer,
} from '../analyzer/face-analysis';
import { GalleryService } from '../gallery/gallery.service';
import { ActivityLogService } from '../activity/activity-log.service';
import {
  fingerprintOf,
  FingerprintService,
} from '../fingerprint/fingerprint.service';
import {
  DISPLAY_CODE_GENERATOR,
  DisplayCodeGenerator,
  SequentialDisplayCodeGenerator,
} from '../gallery/display-code.generator';
import { compareEmbeddings } from '../comparator/embedding-comparator';
import { CLOCK } from '../shared/clock';
import {
  FaceAnalysisError,
  IdentityCodeCollisionError,
  InvalidThresholdError,
} from '../shared/errors';
import {
  SteppingClock,
  sqliteTestingModule,
} from '../testing/sqlite-testing.module';

const face = (embedding: number[], age = 30): FaceAnalysis => ({
  facesFound: 1,
  embedding,
  attributes: { age },
});

/**
 * Analyzer stand-in keyed by the image bytes. Yields to the event loop before
 * answering so concurrent requests interleave.
 */
class FakeAnalyzer implements FaceAnalyzer {
  private readonly answers = new Map<string, FaceAnalysis>();
  calls = 0;

  answer(image: string, analysis: FaceAnalysis): Buffer {
    this.answers.set(image, analysis);
    return Buffer.from(image);
  }

  async analyze(image: Buffer): Promise<FaceAnalysis> {
    this.calls += 1;
    await new Promise((resolve) => setImmediate(resolve));
    const analysis = this.answers.get(image.toString());
    if (!analysis) throw new FaceAnalysisError('Could not decode image');
    return analysis;
  }
}

describe('RegistrationService', () => {
  let module: TestingModule;
  let service: RegistrationService;
  let gallery: GalleryService;
  let activity: ActivityLogService;
  let fingerprints: FingerprintService;
  let notifier: OutcomeNotifierService;
  let analyzer: FakeAnalyzer;

  const createModule = async (
    generator: DisplayCodeGenerator = new SequentialDisplayCodeGenerator(),
  ) => {
    analyzer = new FakeAnalyzer();
    module = await Test.createTestingModule({
      imports: [sqliteTestingModule(), RegistrationModule],
    })
      .overrideProvider(CLOCK)
      .useValue(new SteppingClock('2026-03-01T10:00:00.000Z'))
      .overrideProvider(DISPLAY_CODE_GENERATOR)
      .useValue(generator)
      .overrideProvider(FACE_ANALYZER)
      .useValue(analyzer)
      .compile();

    service = module.get<RegistrationService>(RegistrationService);
    gallery = module.get<GalleryService>(GalleryService);
    activity = module.get<ActivityLogService>(ActivityLogService);
    fingerprints = module.get<FingerprintService>(FingerprintService);
    notifier = module.get<OutcomeNotifierService>(OutcomeNotifierService);
  };

  afterEach(async () => {
    await module.close();
  });

  describe('with a fresh gallery', () => {
    beforeEach(() => createModule());

    it('registers an unknown face', async () => {
      const image = analyzer.answer('alice-1', face([1, 0, 0], 27));

      const outcome = await service.register({ image });

      expect(outcome).toEqual({
        status: 'new_person_registered',
        identityId: expect.any(String),
        displayCode: 'PERSON_20260301_1000_0001',
        attributes: { age: 27 },
      });
      const [event] = await activity.recent();
      expect(event.kind).toBe('registration');
      expect(event.confidence).toBeNull();
      expect(event.contentFingerprint).toBe(fingerprintOf(image));
    });

    it.each([0.1, 0.65, 1])(
      'answers exact duplicate for repeated bytes at threshold %p',
      async (threshold) => {
        const image = analyzer.answer('alice-1', face([1, 0, 0]));
        const first = await service.register({ image });
        if (first.status !== 'new_person_registered')
          throw new Error(first.status);
        const [registration] = await activity.recent();

        const second = await service.register({ image, threshold });
        const third = await service.register({ image: Buffer.from('alice-1') });

        const duplicate: RegistrationOutcome = {
          status: 'exact_duplicate',
          eventId: registration.eventId,
          identityId: first.identityId,
        };
        expect(second).toEqual(duplicate);
        expect(third).toEqual(duplicate);

        const stats = await activity.stats();
        expect(stats.totalDetections).toBe(1);
        expect(stats.totalExactDuplicates).toBe(2);
        expect(
          (await gallery.findById(first.identityId))?.totalDetections,
        ).toBe(1);
      },
    );

    it('answers repeated bytes without calling the analyzer again', async () => {
      const image = analyzer.answer('alice-1', face([1, 0, 0]));

      await service.register({ image });
      const second = await service.register({ image });
      const third = await service.register({ image });

      expect(second.status).toBe('exact_duplicate');
      expect(third.status).toBe('exact_duplicate');
      expect(analyzer.calls).toBe(1);
      expect(
        (await fingerprints.lookup(fingerprintOf(image)))?.duplicateHits,
      ).toBe(2);
    });

    it('recognizes a similar face from different bytes', async () => {
      const first = await service.register({
        image: analyzer.answer('alice-1', face([1, 0, 0])),
      });
      const second = await service.register({
        image: analyzer.answer('alice-2', face([0.9, 0.1, 0])),
      });
      const third = await service.register({
        image: analyzer.answer('alice-3', face([0.8, 0.3, 0.1])),
      });

      if (first.status !== 'new_person_registered')
        throw new Error(first.status);
      const firstScore = compareEmbeddings([1, 0, 0], [0.9, 0.1, 0]);
      const secondScore = compareEmbeddings([1, 0, 0], [0.8, 0.3, 0.1]);

      expect(second).toMatchObject({
        status: 'person_recognized',
        identityId: first.identityId,
        displayCode: first.displayCode,
        totalDetections: 2,
      });
      expect(third).toMatchObject({
        status: 'person_recognized',
        identityId: first.identityId,
        totalDetections: 3,
      });
      if (third.status !== 'person_recognized') throw new Error(third.status);
      expect(third.confidence).toBeCloseTo(secondScore, 12);
      expect(third.averageConfidence).toBeCloseTo(
        (firstScore + secondScore) / 2,
        12,
      );
      expect(third.firstSeen.toISOString()).toBe('2026-03-01T10:00:00.000Z');

      const identity = await gallery.findById(first.identityId);
      expect(identity?.representativeEmbedding).toEqual([1, 0, 0]);
      expect(await gallery.count()).toBe(1);
    });

    it('registers faces that do not match as separate people', async () => {
      const alice = await service.register({
        image: analyzer.answer('alice-1', face([1, 0])),
      });
      const bob = await service.register({
        image: analyzer.answer('bob-1', face([0, 1])),
      });

      expect(alice.status).toBe('new_person_registered');
      expect(bob).toMatchObject({
        status: 'new_person_registered',
        displayCode: 'PERSON_20260301_1000_0002',
      });
      expect(await gallery.count()).toBe(2);
    });

    it('reports zero faces without writing anything', async () => {
      const image = analyzer.answer('empty-room', {
        facesFound: 0,
        attributes: { age: null },
      });

      expect(await service.register({ image })).toEqual({ status: 'no_face' });
      expect(await activity.stats()).toMatchObject({
        totalIdentities: 0,
        totalDetections: 0,
      });
      expect(await fingerprints.lookup(fingerprintOf(image))).toBeNull();
    });

    it('rejects several faces without writing anything', async () => {
      const image = analyzer.answer('group-photo', {
        facesFound: 3,
        attributes: { age: null },
      });

      expect(await service.register({ image })).toEqual({
        status: 'multiple_faces',
        facesFound: 3,
      });
      expect(await gallery.count()).toBe(0);
      expect(await fingerprints.lookup(fingerprintOf(image))).toBeNull();
    });

    it('reports analyzer failures without writing anything', async () => {
      const image = Buffer.from('not-an-image');

      expect(await service.register({ image })).toEqual({
        status: 'analysis_failed',
        error: 'Could not decode image',
      });
      expect(await activity.recent()).toEqual([]);
      expect(await fingerprints.lookup(fingerprintOf(image))).toBeNull();
    });

    it('treats a face without embedding as a failed analysis', async () => {
      const outcome = await service.resolve('abc123', {
        facesFound: 1,
        attributes: { age: 40 },
      });

      expect(outcome).toEqual({
        status: 'analysis_failed',
        error: 'Analyzer reported a face without an embedding',
      });
      expect(await gallery.count()).toBe(0);
    });

    it('rejects an invalid threshold before calling the analyzer', async () => {
      const image = analyzer.answer('alice-1', face([1, 0]));

      await expect(service.register({ image, threshold: 0 })).rejects.toThrow(
        InvalidThresholdError,
      );
      expect(analyzer.calls).toBe(0);
    });

    it('notifies about registrations and recognitions only', async () => {
      const notify = jest.spyOn(notifier, 'notify');
      const image = analyzer.answer('alice-1', face([1, 0]));

      await service.register({ image });
      await service.register({ image });
      await service.register({
        image: analyzer.answer('alice-2', face([0.95, 0.05])),
      });

      expect(notify.mock.calls.map(([outcome]) => outcome.status)).toEqual([
        'new_person_registered',
        'person_recognized',
      ]);
    });
  });

  describe('threshold', () => {
    beforeEach(() => createModule());

    it.each([
      [0.97, 'new_person_registered'],
      [0.96, 'person_recognized'],
      [0.95, 'person_recognized'],
    ])('at %p turns a 0.96 match into %s', async (threshold, status) => {
      await service.register({ image: analyzer.answer('first', face([3, 4])) });

      const outcome = await service.register({
        image: analyzer.answer('second', face([4, 3])),
        threshold,
      });

      expect(outcome.status).toBe(status);
    });
  });

  describe('under concurrent load', () => {
    beforeEach(() => createModule());

    it('registers a person only once when requests race', async () => {
      const requests = Array.from({ length: 8 }, (_, i) =>
        service.register({
          image: analyzer.answer(`carol-${i}`, face([1, 0.01 * i, 0])),
        }),
      );

      const outcomes = await Promise.all(requests);
      const statuses = outcomes.map((outcome) => outcome.status);

      expect(
        statuses.filter((s) => s === 'new_person_registered'),
      ).toHaveLength(1);
      expect(statuses.filter((s) => s === 'person_recognized')).toHaveLength(7);
      expect(await gallery.count()).toBe(1);

      const [identity] = await gallery.list();
      expect(identity.totalDetections).toBe(8);
      expect((await activity.stats()).totalDetections).toBe(8);
    });

    it('lets only one of several identical uploads win first sight', async () => {
      const image = analyzer.answer('dave-1', face([0, 0, 1]));

      const outcomes = await Promise.all(
        Array.from({ length: 4 }, () => service.register({ image })),
      );
      const statuses = outcomes.map((outcome) => outcome.status).sort();

      expect(statuses).toEqual([
        'exact_duplicate',
        'exact_duplicate',
        'exact_duplicate',
        'new_person_registered',
      ]);
      expect((await activity.stats()).totalDetections).toBe(1);
    });
  });

  describe('when a registration fails', () => {
    beforeEach(() =>
      createModule({ generate: () => 'PERSON_20260301_1000_0001' }),
    );

    it('rolls back and keeps serving later requests', async () => {
      await service.register({
        image: analyzer.answer('erin-1', face([1, 0])),
      });
      const failing = analyzer.answer('frank-1', face([0, 1]));

      await expect(service.register({ image: failing })).rejects.toThrow(
        IdentityCodeCollisionError,
      );
      expect(await gallery.count()).toBe(1);
      expect(await fingerprints.lookup(fingerprintOf(failing))).toBeNull();
      expect((await activity.stats()).totalDetections).toBe(1);

      const outcome = await service.register({
        image: analyzer.answer('erin-2', face([0.99, 0.01])),
      });
      expect(outcome).toMatchObject({
        status: 'person_recognized',
        totalDetections: 2,
      });
    });
  });
});

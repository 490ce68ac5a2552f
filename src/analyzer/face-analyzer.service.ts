import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import FormData from 'form-data';
import { catchError, firstValueFrom, map, throwError } from 'rxjs';
import {
  FaceAnalysis,
  FaceAnalyzer,
  FaceAttributes,
  ScoredAttribute,
} from './face-analysis';
import { FaceAnalysisError } from '../shared/errors';

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number | null {
  const parsed = typeof value === 'string' ? Number(value) : value;
  return typeof parsed === 'number' && Number.isFinite(parsed) ? parsed : null;
}

function toScoredAttribute(
  scores: unknown,
  dominant: unknown,
): ScoredAttribute | undefined {
  if (!isRecord(scores) || dominant === undefined || dominant === null) {
    return undefined;
  }
  const cleaned: Record<string, number> = {};
  for (const [label, score] of Object.entries(scores)) {
    const value = toNumber(score);
    if (value !== null) cleaned[label] = value;
  }
  return { dominant: String(dominant), scores: cleaned };
}

function toEmbedding(value: unknown): number[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new FaceAnalysisError('Analyzer returned a face without embedding');
  }
  return value.map((component) => {
    const parsed = toNumber(component);
    if (parsed === null) {
      throw new FaceAnalysisError('Analyzer returned a non-numeric embedding');
    }
    return parsed;
  });
}

function toFaceAttributes(face: JsonRecord): FaceAttributes {
  const age = toNumber(face.age);
  const attributes: FaceAttributes = {
    age: age === null ? null : Math.round(age),
  };

  const gender = toScoredAttribute(face.gender, face.dominant_gender);
  const emotion = toScoredAttribute(face.emotion, face.dominant_emotion);
  const ethnicity = toScoredAttribute(face.race, face.dominant_race);
  if (gender) attributes.gender = gender;
  if (emotion) attributes.emotion = emotion;
  if (ethnicity) attributes.ethnicity = ethnicity;

  return attributes;
}

/**
 * Maps the analyzer's `{ faces: [...] }` body. The embedding is only read
 * when exactly one face was found.
 */
export function toFaceAnalysis(body: unknown): FaceAnalysis {
  if (!isRecord(body) || !Array.isArray(body.faces)) {
    throw new FaceAnalysisError('Analyzer response has no faces list');
  }
  const faces: unknown[] = body.faces;
  if (faces.length !== 1) {
    return { facesFound: faces.length, attributes: { age: null } };
  }

  const [face] = faces;
  if (!isRecord(face)) {
    throw new FaceAnalysisError('Analyzer returned a malformed face');
  }
  return {
    facesFound: 1,
    embedding: toEmbedding(face.embedding),
    attributes: toFaceAttributes(face),
  };
}

/**
 * HTTP client for the external face analysis engine.
 */
@Injectable()
export class FaceAnalyzerService implements FaceAnalyzer {
  private readonly logger = new Logger('FaceAnalyzer');

  constructor(
    private http: HttpService,
    private configService: ConfigService,
  ) {}

  private getAnalyzerHost() {
    return this.configService.get<string>(
      'ANALYZER_URL',
      'http://127.0.0.1:8080',
    );
  }

  analyze(image: Buffer, filename: string): Promise<FaceAnalysis> {
    const host = `${this.getAnalyzerHost()}/analyze`;

    const form = new FormData();
    form.append('image', image, { filename });

    return firstValueFrom(
      this.http
        .post<unknown>(host, form, {
          headers: form.getHeaders(),
          timeout: Number(
            this.configService.get<string>('ANALYZER_TIMEOUT', '30000'),
          ),
        })
        .pipe(
          map((response) => toFaceAnalysis(response.data)),
          catchError((err: unknown) => {
            const message = err instanceof Error ? err.message : String(err);
            this.logger.error(`Analysis of ${filename} failed: ${message}`);
            return throwError(() =>
              err instanceof FaceAnalysisError
                ? err
                : new FaceAnalysisError(`Face analysis failed: ${message}`),
            );
          }),
        ),
    );
  }
}

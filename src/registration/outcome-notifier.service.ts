import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { catchError, of } from 'rxjs';
import { ResolvedOutcome } from './registration-outcome';
import { toRegistrationResponse } from './registration-response';

/**
 * Posts recognitions and registrations to `CALLBACK_URL`, when one is set.
 * Delivery is best effort and never affects the outcome.
 */
@Injectable()
export class OutcomeNotifierService {
  private readonly logger = new Logger('OutcomeNotifier');

  constructor(private http: HttpService, private config: ConfigService) {}

  notify(outcome: ResolvedOutcome): void {
    const host = this.config.get<string>('CALLBACK_URL');
    if (!host) return;

    this.http
      .post(host, toRegistrationResponse(outcome))
      .pipe(
        catchError((err: unknown) => {
          const message = err instanceof Error ? err.message : String(err);
          this.logger.warn(
            `Failed to notify ${host} about ${outcome.identityId}: ${message}`,
          );
          return of(null);
        }),
      )
      .subscribe();
  }
}

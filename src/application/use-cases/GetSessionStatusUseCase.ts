/**
 * Use case for getting one session's status snapshot
 */

import type { SessionSnapshot } from '../../domain/entities';
import type { StreamingErrorKind } from '../../domain/errors';
import type { StatusReporter } from '../services/StatusReporter';

export interface GetSessionStatusRequest {
  sessionId: string;
}

export interface GetSessionStatusResponse {
  success: boolean;
  status?: SessionSnapshot;
  error?: string;
  errorKind?: StreamingErrorKind;
}

export class GetSessionStatusUseCase {
  constructor(
    private statusReporter: StatusReporter
  ) {}

  execute(request: GetSessionStatusRequest): GetSessionStatusResponse {
    const result = this.statusReporter.snapshot(request.sessionId);

    if (!result.success) {
      return {
        success: false,
        error: result.message,
        errorKind: result.error
      };
    }

    return {
      success: true,
      status: result.value
    };
  }
}

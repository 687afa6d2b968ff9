/**
 * Use case for adding a source
 * Registers the id, waits for metadata and sets up streaming priorities
 */

import type { ILogger } from '../../domain/interfaces';
import type { SessionSnapshot } from '../../domain/entities';
import { StreamingErrorKind, describeError } from '../../domain/errors';
import type { DownloadRegistry } from '../services/DownloadRegistry';
import type { MetadataAcquirer } from '../services/MetadataAcquirer';
import type { PrioritizationPolicy } from '../services/PrioritizationPolicy';
import type { StatusReporter } from '../services/StatusReporter';

export interface AddSourceRequest {
  sourceDescriptor: string;
  title?: string;
}

export interface AddSourceResponse {
  success: boolean;
  sessionId?: string;
  status?: SessionSnapshot;
  error?: string;
  errorKind?: StreamingErrorKind;
}

export class AddSourceUseCase {
  constructor(
    private registry: DownloadRegistry,
    private metadataAcquirer: MetadataAcquirer,
    private prioritizationPolicy: PrioritizationPolicy,
    private statusReporter: StatusReporter,
    private logger: ILogger
  ) { }

  async execute(request: AddSourceRequest): Promise<AddSourceResponse> {
    const sourceDescriptor = request.sourceDescriptor.trim();
    if (!sourceDescriptor) {
      return {
        success: false,
        error: 'Source descriptor required',
        errorKind: StreamingErrorKind.INVALID_REQUEST
      };
    }

    try {
      this.logger.info(`Adding source: ${sourceDescriptor.substring(0, 50)}...`);
      const { id, session, reused } = this.registry.add(sourceDescriptor, request.title);

      if (!reused) {
        this.logger.info(`Waiting for metadata for ${id}`);
        const acquired = await this.metadataAcquirer.acquire(session);
        if (!acquired.success) {
          return { success: false, error: acquired.message, errorKind: acquired.error };
        }

        const prioritized = this.prioritizationPolicy.apply(session);
        if (!prioritized.success) {
          this.registry.evict(session, false);
          return { success: false, error: prioritized.message, errorKind: prioritized.error };
        }
      }

      const snapshot = this.statusReporter.snapshot(id);
      if (!snapshot.success) {
        return { success: false, error: snapshot.message, errorKind: snapshot.error };
      }

      this.logger.info(`Source added: ${snapshot.value.name} as ${id}`);
      return { success: true, sessionId: id, status: snapshot.value };
    } catch (error) {
      this.logger.error('Error in AddSourceUseCase:', error);
      return {
        success: false,
        error: describeError(error),
        errorKind: StreamingErrorKind.ENGINE_FAILURE
      };
    }
  }
}

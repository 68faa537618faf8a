import { EventBridgeClient, PutEventsCommand } from '@aws-sdk/client-eventbridge';
import { REFRESH_EVENT_SOURCE, REFRESH_REQUESTED, RefreshRequest } from '../../types/RefreshEvents';
import { Logger } from '../core/Logger';

export interface RefreshRequestSink {
  requestRefresh(request: RefreshRequest): Promise<void>;
}

/**
 * RefreshRequestPublisher - hands a run to the orchestrator through EventBridge
 */
export class RefreshRequestPublisher implements RefreshRequestSink {
  constructor(
    private eventBridgeClient: EventBridgeClient,
    private eventBusName: string,
    private logger: Logger
  ) {}

  async requestRefresh(request: RefreshRequest): Promise<void> {
    try {
      const command = new PutEventsCommand({
        Entries: [
          {
            Source: REFRESH_EVENT_SOURCE,
            DetailType: REFRESH_REQUESTED,
            Detail: JSON.stringify(request),
            EventBusName: this.eventBusName,
          },
        ],
      });

      const result = await this.eventBridgeClient.send(command);

      if (result.FailedEntryCount && result.FailedEntryCount > 0) {
        const error = result.Entries?.[0]?.ErrorMessage || 'Unknown error';
        throw new Error(`Failed to publish refresh request: ${error}`);
      }

      this.logger.info('Refresh requested', {
        region: request.region,
        reportSource: request.reportSource,
        batchDate: request.batchDate,
        runId: request.runId,
      });
    } catch (error) {
      this.logger.error('Failed to publish refresh request', {
        region: request.region,
        reportSource: request.reportSource,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}

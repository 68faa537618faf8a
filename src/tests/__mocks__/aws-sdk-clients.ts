/**
 * Mock AWS SDK clients for unit testing
 */

// Mock RDS Data API client (audit store)
export const mockRdsDataClient = {
  send: jest.fn(),
};

// Mock Redshift Data API client (execution engine)
export const mockRedshiftDataClient = {
  send: jest.fn(),
};

// Mock SNS client
export const mockSnsClient = {
  send: jest.fn(),
};

// Mock S3 Client
export const mockS3Client = {
  send: jest.fn(),
};

// Mock EventBridge Client
export const mockEventBridgeClient = {
  send: jest.fn(),
};

// Helper to reset all mocks
export function resetAllMocks() {
  mockRdsDataClient.send.mockReset();
  mockRedshiftDataClient.send.mockReset();
  mockSnsClient.send.mockReset();
  mockS3Client.send.mockReset();
  mockEventBridgeClient.send.mockReset();
}

// Helper to create an RDS Data API query response (formatRecordsAs JSON)
export function createRdsQueryResponse(rows: Record<string, unknown>[]) {
  return {
    formattedRecords: JSON.stringify(rows),
  };
}

// Helper to create an RDS Data API write response
export function createRdsUpdateResponse(numberOfRecordsUpdated: number) {
  return {
    numberOfRecordsUpdated,
  };
}

// Helper to create successful EventBridge responses
export function createEventBridgeSuccessResponse() {
  return {
    FailedEntryCount: 0,
    Entries: [],
  };
}

// Helper to create S3 ListObjectsV2 responses
export function createS3ListResponse(keys: string[], nextContinuationToken?: string) {
  return {
    Contents: keys.map((Key) => ({ Key })),
    IsTruncated: Boolean(nextContinuationToken),
    NextContinuationToken: nextContinuationToken,
  };
}

// Instant sleep that records requested durations
export function createRecordingSleep() {
  const calls: number[] = [];
  const sleep = jest.fn(async (ms: number) => {
    calls.push(ms);
  });
  return { sleep, calls };
}

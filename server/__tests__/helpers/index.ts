export { createMockLogger, createMockLoggerModule } from "./mockLogger";
export type { MockLogger } from "./mockLogger";

export { createMockRequest, createMockResponse, createMockNext } from "./mockRequest";
export type { MockRequestOptions, MockResponse } from "./mockRequest";

export { RecordingTransport } from "./fakeTransport";
export type { SentMessage, OpenedPoll } from "./fakeTransport";

export { createTestBot } from "./botDeps";
export type { TestBot } from "./botDeps";

export {
  createSong,
  createCatalog,
  createState,
  sequenceRandom,
  captureEngagementError,
  rejectedEngagementError,
} from "./fixtures";

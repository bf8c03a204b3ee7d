import type { IncomingRequest, RequestContext } from "../dispatch/types.js";
import { createSessionAccessor } from "../session/accessor.js";

export function createTestRequest(overrides: Partial<IncomingRequest> = {}): IncomingRequest {
  return {
    method: "GET",
    path: "/",
    rawQuery: "",
    headers: {},
    session: createSessionAccessor(),
    ...overrides,
  };
}

export function createTestContext(overrides: Partial<RequestContext> = {}): RequestContext {
  return {
    ...createTestRequest(),
    normalizedPath: "",
    query: {},
    ...overrides,
  };
}

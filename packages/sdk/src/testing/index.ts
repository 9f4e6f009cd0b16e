/**
 * Testing utilities for the admin client.
 * Import via: import { createMockAdminServer } from "@dgraph-admin/sdk/testing";
 */

export { MockAdminServer, createMockAdminServer } from "./mock-admin-server.js";
export type { MockHandler, MockResponse, RecordedRequest } from "./mock-admin-server.js";

// Jest setup: route global fetch through the programmable handler in
// src/test/helpers and keep logger output out of the test report.

import { handleFetch, resetFetchMock } from "../src/test/helpers.js";

beforeEach(() => {
  resetFetchMock();
  jest.spyOn(globalThis, "fetch").mockImplementation(handleFetch);
  jest.spyOn(console, "log").mockImplementation(() => undefined);
  jest.spyOn(console, "error").mockImplementation(() => undefined);
  jest.spyOn(console, "warn").mockImplementation(() => undefined);
  jest.spyOn(console, "debug").mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

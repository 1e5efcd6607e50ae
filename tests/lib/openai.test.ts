// Mock OpenAI before importing module
jest.mock("openai");

import OpenAI from "openai";
import { createOpenAIClient } from "../../src/lib/openai.js";

describe("createOpenAIClient", () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it("should build an SDK client with the key, timeout and no retries", () => {
    const client = createOpenAIClient("test-key", 15000);

    expect(OpenAI).toHaveBeenCalledWith({
      apiKey: "test-key",
      timeout: 15000,
      maxRetries: 0,
      defaultHeaders: { "User-Agent": "artwork-gallery-enrichment/1.0" },
    });
    expect(client).toBeInstanceOf(OpenAI);
  });

  it("should create a new client per call", () => {
    createOpenAIClient("test-key", 1000);
    createOpenAIClient("other-key", 2000);

    expect(OpenAI).toHaveBeenCalledTimes(2);
  });
});

import { describe, it, expect, vi } from "vitest";
import {
  DimensionMismatchError,
  EmbeddingServiceError,
  InvalidRequestError,
  NotConfiguredError,
  RateLimitedError,
  ServiceUnavailableError,
} from "@ingestkit/errors";
import type { EmbeddingResult } from "@ingestkit/types";
import { EmbeddingClient, prepareText } from "./embedding-client.js";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

class FakeProvider implements IEmbeddingProvider {
  readonly name = "fake";
  readonly model = "fake-model";
  readonly calls: string[][] = [];
  private failures: Error[];

  constructor(
    readonly dimensions: number,
    failures: Error[] = [],
    private readonly vectorFor: (text: string, i: number) => number[] = (_t, i) =>
      new Array<number>(dimensions).fill(i + 1),
  ) {
    this.failures = [...failures];
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    this.calls.push(texts);
    const failure = this.failures.shift();
    if (failure) throw failure;
    const embeddings = texts.map((t, i) => this.vectorFor(t, i));
    return { embeddings, model: this.model, tokensUsed: texts.length, dimensions: this.dimensions };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

const noSleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});

describe("EmbeddingClient", () => {
  it("preserves length and fills empty texts with zero vectors", async () => {
    const provider = new FakeProvider(3);
    const client = new EmbeddingClient({ provider });

    const vectors = await client.embed(["a", "   ", "b\nc"]);

    expect(provider.calls).toEqual([["a", "b c"]]);
    expect(vectors).toEqual([
      [1, 1, 1],
      [0, 0, 0],
      [2, 2, 2],
    ]);
  });

  it("does not call the provider when every text is empty", async () => {
    const provider = new FakeProvider(4);
    const client = new EmbeddingClient({ provider });

    await expect(client.embed(["", "\n"])).resolves.toEqual([
      [0, 0, 0, 0],
      [0, 0, 0, 0],
    ]);
    expect(provider.calls).toHaveLength(0);
  });

  it("retries transient failures with doubling delays", async () => {
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
    const provider = new FakeProvider(2, [
      new RateLimitedError("slow down"),
      new ServiceUnavailableError("down", "fake"),
    ]);
    const client = new EmbeddingClient({ provider, retryBackoffMs: 10, sleep });

    await expect(client.embed(["x"])).resolves.toEqual([[1, 1]]);
    expect(provider.calls).toHaveLength(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([10, 20]);
  });

  it("gives up after maxRetries + 1 attempts", async () => {
    const failures = [1, 2, 3].map(() => new ServiceUnavailableError("down", "fake"));
    const provider = new FakeProvider(2, failures);
    const client = new EmbeddingClient({
      provider,
      maxRetries: 2,
      retryBackoffMs: 1,
      sleep: noSleep,
    });

    const error = await client.embed(["x"]).catch((e: unknown) => e);

    expect(provider.calls).toHaveLength(3);
    expect(error).toBeInstanceOf(EmbeddingServiceError);
    if (error instanceof EmbeddingServiceError) {
      expect(error.attempts).toBe(3);
      expect(error.cause).toBe(failures[2]);
      expect(error.details).toEqual({ kind: "server", reason: "exhausted" });
    }
  });

  it("fails at once on client and configuration errors", async () => {
    const failures = [new InvalidRequestError("bad input"), new NotConfiguredError("no key")];
    for (const failure of failures) {
      const provider = new FakeProvider(2, [failure]);
      const client = new EmbeddingClient({ provider, sleep: noSleep });

      await expect(client.embed(["x"])).rejects.toBeInstanceOf(EmbeddingServiceError);
      expect(provider.calls).toHaveLength(1);
    }
  });

  it("stops retrying once the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const provider = new FakeProvider(2, [new RateLimitedError("slow down")]);
    const client = new EmbeddingClient({ provider, signal: controller.signal });

    await expect(client.embed(["x"])).rejects.toThrow("Embedding aborted: slow down");
    expect(provider.calls).toHaveLength(1);
  });

  it("rejects vectors of the wrong dimension", async () => {
    const provider = new FakeProvider(3);
    const client = new EmbeddingClient({ provider, dimensions: 4 });

    await expect(client.embed(["x"])).rejects.toThrow(
      new DimensionMismatchError(4, 3, "embedding"),
    );
  });

  it("rejects a vector count that does not match the inputs", async () => {
    const provider = new FakeProvider(2);
    provider.batchEmbed = async () => ({
      embeddings: [[1, 1]],
      model: "fake-model",
      tokensUsed: 2,
      dimensions: 2,
    });
    const client = new EmbeddingClient({ provider });

    await expect(client.embed(["x", "y"])).rejects.toBeInstanceOf(DimensionMismatchError);
  });
});

describe("prepareText", () => {
  it("flattens newlines and trims", () => {
    expect(prepareText("  line one\r\nline two\n")).toBe("line one line two");
  });
});

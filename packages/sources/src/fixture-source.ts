import { SourceNotFoundError } from "@ingestkit/errors";
import type { Document } from "@ingestkit/types";
import type { ISourceFetcher } from "./source.interface.js";
import { schemeOf, stripScheme } from "./uri.js";

export const DEFAULT_FIXTURE_SET = "default";

const DEFAULT_FIXTURES: readonly Document[] = [
  {
    id: "doc1",
    text:
      "A vector index stores embeddings and answers nearest-neighbour queries. " +
      "HNSW graphs keep those queries fast as the collection grows.",
    metadata: { topic: "vector-index" },
  },
  {
    id: "doc2",
    text:
      "Retrieval-augmented generation looks up relevant passages first and hands them " +
      "to a language model as context for its answer.",
    metadata: { topic: "retrieval" },
  },
  {
    id: "doc3",
    text:
      "An alias lets readers keep querying one stable name while a freshly built " +
      "collection is swapped in behind it.",
    metadata: { topic: "aliases" },
  },
];

/**
 * In-process documents for dry runs and tests. `fixture://<set>` picks a named
 * set. Any other URI, such as the real location handed to a job whose source
 * type is overridden to `mock`, gets the default set.
 */
export class FixtureSource implements ISourceFetcher {
  readonly kind = "fixture";
  private readonly sets: ReadonlyMap<string, readonly Document[]>;

  constructor(sets: Record<string, readonly Document[]> = {}) {
    this.sets = new Map(Object.entries({ [DEFAULT_FIXTURE_SET]: DEFAULT_FIXTURES, ...sets }));
  }

  async fetch(uri: string): Promise<Document[]> {
    const name =
      schemeOf(uri) === "fixture"
        ? stripScheme(uri).split("/")[0] || DEFAULT_FIXTURE_SET
        : DEFAULT_FIXTURE_SET;
    const documents = this.sets.get(name);

    if (!documents) {
      throw new SourceNotFoundError(`Unknown fixture set: ${name}`);
    }

    return documents.map((doc) => ({
      id: doc.id,
      text: doc.text,
      metadata: { source: "fixture", ...doc.metadata },
    }));
  }
}

import type { Document } from "@ingestkit/types";

export interface ISourceFetcher {
  readonly kind: string;
  fetch(uri: string): Promise<Document[]>;
}

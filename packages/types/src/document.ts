export type MetadataValue = string | number;

/** Insertion-ordered metadata attached to documents and chunks. */
export type DocumentMetadata = Record<string, MetadataValue>;

export type DocumentFormat = "text" | "markdown" | "html";

export interface Document {
  id: string;
  text: string;
  metadata: DocumentMetadata;
}

export const SUPPORTED_EXTENSIONS = [
  ".txt",
  ".md",
  ".markdown",
  ".html",
  ".htm",
  ".json",
  ".yaml",
  ".yml",
  ".rst",
  ".csv",
  ".xml",
] as const;

export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

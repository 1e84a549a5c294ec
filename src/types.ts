// src/types.ts

export type Scalar = string | number | boolean | null;

export type MetadataValue = Scalar | Scalar[];

/** Front matter of a record. Key order is insertion order and is kept on write. */
export type Metadata = Record<string, MetadataValue>;

export type Collection = "pending" | "archived";

/** How a record file was laid out when read; a rewrite keeps it. */
export interface RecordFormat {
  bom: boolean;
  eol: "\n" | "\r\n";
  /** Front matter text as read, `\n` line endings, without the delimiters. */
  header?: string;
}

export interface ParsedRecord {
  metadata: Metadata;
  body: string;
  format?: RecordFormat;
}

export interface ArticleRecord extends ParsedRecord {
  /** File name inside its collection, e.g. `some-article.md`. */
  id: string;
  collection: Collection;
}

export type RecordPredicate = (record: ArticleRecord) => boolean;

export type RecordMutator = (record: ParsedRecord) => ParsedRecord;

export type ArticleState = "pending" | "sent" | "read" | "archived";

export interface Candidate {
  record: ArticleRecord;
  wordCount: number;
}

export interface ReadFeedback {
  liked: boolean;
  notes: string;
}

export interface Chapter {
  id: string;
  title: string;
  author?: string;
  date?: string;
  body: string;
}

export interface BundleMetadata {
  title: string;
  subtitle: string;
  author: string;
  date: string;
  lang: string;
}

export interface BundleResult {
  artifactPath: string;
  title: string;
  marked: string[];
}

export interface ArchiveSummary {
  processed: number;
  skipped: number;
  archived: number;
  failed: Array<{ id: string; reason: string }>;
  interrupted: boolean;
}

export type LogLevel = "quiet" | "normal" | "verbose";

export type SelectionMode = "auto" | "interactive";

export interface DeliveryConfig {
  to: string;
  from: string;
  relay: string;
  port: number;
  encryption: string;
  password: string;
}

export interface Config {
  inboxDir: string;
  archiveDir: string;
  outputDir: string;
  targetWords: number;
  mode?: SelectionMode;
  newestFirst: boolean;
  kindleAddress?: string;
  smtpUser?: string;
  smtpRelay: string;
  smtpPort: number;
  smtpEncryption: string;
  smtpPassword?: string;
  pandocBin: string;
  calibreSmtpBin: string;
  logLevel: LogLevel;
}

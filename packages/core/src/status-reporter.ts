import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { errorMessage, fromHttpStatus } from "@ingestkit/errors";
import { createSilentLogger, redactUri, type Logger } from "@ingestkit/logger";
import type { JobKind, JobPhase, JobStatus, StatusConfig } from "@ingestkit/types";

/** Somewhere a status record goes besides the log. */
export interface IStatusSink {
  readonly name: string;
  write(status: JobStatus): Promise<void>;
}

/** Overwrites one JSON file with the latest record, for a sidecar to read. */
export class FileStatusSink implements IStatusSink {
  readonly name = "file";

  constructor(private readonly filePath: string) {}

  async write(status: JobStatus): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, `${JSON.stringify(status, null, 2)}\n`, "utf8");
  }
}

export class WebhookStatusSink implements IStatusSink {
  readonly name = "webhook";

  constructor(
    private readonly url: string,
    private readonly fetchFn: typeof fetch = globalThis.fetch,
  ) {}

  async write(status: JobStatus): Promise<void> {
    const response = await this.fetchFn(this.url, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(status),
    });

    if (!response.ok) {
      const message = `Status webhook ${redactUri(this.url)} answered ${String(response.status)}`;
      throw fromHttpStatus("status-webhook", response.status, message);
    }
  }
}

export function percentage(processed: number, total: number): number {
  if (total <= 0) return 0;
  return Math.floor((processed / total) * 100);
}

export interface StatusReporterOptions {
  sinks?: IStatusSink[];
  logger?: Logger;
  now?: () => Date;
}

/**
 * Builds job status records, logs every one and hands it to each sink.
 * A failing sink is logged and skipped; reporting never fails a job.
 */
export class StatusReporter {
  private readonly sinks: IStatusSink[];
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: StatusReporterOptions = {}) {
    this.sinks = options.sinks ?? [];
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? (() => new Date());
  }

  /** File sink always; webhook sink only when a URL is configured. */
  static fromConfig(
    config: StatusConfig,
    options: { logger?: Logger; fetch?: typeof fetch } = {},
  ): StatusReporter {
    const sinks: IStatusSink[] = [new FileStatusSink(config.filePath)];
    if (config.webhookUrl) {
      sinks.push(new WebhookStatusSink(config.webhookUrl, options.fetch));
    }
    return new StatusReporter({ sinks, logger: options.logger });
  }

  async reportEmbeddingProgress(
    name: string,
    phase: JobPhase,
    message: string,
    totalChunks = 0,
    processedChunks = 0,
  ): Promise<JobStatus> {
    return this.report(
      this.build("EmbeddingJob", name, phase, message, totalChunks, processedChunks),
    );
  }

  async reportIndexProgress(
    name: string,
    phase: JobPhase,
    message: string,
    totalVectors = 0,
    indexedVectors = 0,
    aliasSwapped = false,
  ): Promise<JobStatus> {
    return this.report({
      ...this.build("IndexJob", name, phase, message, totalVectors, indexedVectors),
      aliasSwapped,
    });
  }

  /** Credentials in URLs are masked here, before any sink or log line sees the message. */
  private build(
    kind: JobKind,
    name: string,
    phase: JobPhase,
    message: string,
    total: number,
    processed: number,
  ): JobStatus {
    return {
      kind,
      name,
      phase,
      message: redactUri(message),
      progress: { total, processed, percentage: percentage(processed, total) },
      timestamp: this.now().toISOString(),
    };
  }

  private async report(status: JobStatus): Promise<JobStatus> {
    const { kind, name, phase, progress } = status;
    const fields = { kind, name, phase, progress };
    const line = `Status update: ${kind}/${name} - ${phase}: ${status.message}`;
    if (status.phase === "Failed") {
      this.logger.error(fields, line);
    } else {
      this.logger.info(fields, line);
    }

    for (const sink of this.sinks) {
      try {
        await sink.write(status);
      } catch (err) {
        const reason = errorMessage(err);
        this.logger.warn({ sink: sink.name, err: reason }, "Could not write status record");
      }
    }

    return status;
  }
}

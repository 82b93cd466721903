export type OutputFormat = "human" | "jsonl";

export type ReportLevel = "info" | "warn" | "error";

export type ReportEntry = {
  level: ReportLevel;
  code: string;
  message: string;
  [field: string]: unknown;
};

export type OutputSink = { write(chunk: string): unknown };

/**
 * Installer output. Human mode prints info to stdout and warnings/errors to
 * stderr; jsonl mode prints one JSON object per line to stdout.
 */
export class Reporter {
  readonly format: OutputFormat;
  private readonly out: OutputSink;
  private readonly err: OutputSink;

  constructor(format: OutputFormat = "human", streams?: { out: OutputSink; err: OutputSink }) {
    this.format = format;
    this.out = streams?.out ?? process.stdout;
    this.err = streams?.err ?? process.stderr;
  }

  info(code: string, message: string, extra: Record<string, unknown> = {}): void {
    this.emit({ ...extra, level: "info", code, message });
  }

  warn(code: string, message: string, extra: Record<string, unknown> = {}): void {
    this.emit({ ...extra, level: "warn", code, message });
  }

  error(code: string, message: string, extra: Record<string, unknown> = {}): void {
    this.emit({ ...extra, level: "error", code, message });
  }

  /** Plain line in human mode; dropped in jsonl mode. */
  line(text = ""): void {
    if (this.format === "human") this.out.write(text + "\n");
  }

  private emit(entry: ReportEntry): void {
    if (this.format === "jsonl") {
      this.out.write(JSON.stringify(entry) + "\n");
      return;
    }
    switch (entry.level) {
      case "info":
        this.out.write(entry.message + "\n");
        break;
      case "warn":
        this.err.write(`Warning: ${entry.message}\n`);
        break;
      case "error":
        this.err.write(`Error: ${entry.message}\n`);
        break;
    }
    if (entry.level !== "info" && typeof entry.remediation === "string") {
      this.err.write(`  ${entry.remediation}\n`);
    }
  }
}

/** Collects output in memory. */
export class MemorySink implements OutputSink {
  readonly chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  text(): string {
    return this.chunks.join("");
  }

  lines(): string[] {
    return this.text().split("\n").filter((l) => l.length > 0);
  }
}

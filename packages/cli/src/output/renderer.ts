import pc from 'picocolors';

export interface OutputSink {
  log(message: string): void;
  error(message: string): void;
}

/**
 * Routes command output to the terminal: rendered reports in human mode,
 * a single JSON document in `--json` mode.
 */
export class OutputRenderer {
  private readonly colors: ReturnType<typeof pc.createColors>;

  constructor(
    private readonly isJson: boolean,
    private readonly sink: OutputSink = console,
    options: { color?: boolean } = {},
  ) {
    this.colors = options.color === false ? pc.createColors(false) : pc;
  }

  /** Prints `report` for people, or `data` as JSON. */
  render(data: unknown, report: string): void {
    if (this.isJson) {
      this.sink.log(JSON.stringify(data, null, 2));
    } else {
      this.sink.log(report);
    }
  }

  heading(fields: Record<string, string>): void {
    if (this.isJson) return;
    for (const [label, value] of Object.entries(fields)) {
      this.sink.log(`${label}: ${value}`);
    }
    this.sink.log('');
  }

  /** Progress note for people; JSON output stays a single document. */
  log(message: string): void {
    if (!this.isJson) {
      this.sink.log(this.colors.gray(message));
    }
  }

  saved(label: string, filePath: string): void {
    if (!this.isJson) {
      this.sink.log(`\n${label} saved to: ${this.colors.cyan(filePath)}`);
    }
  }
}

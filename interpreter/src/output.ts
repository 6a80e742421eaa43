/**
 * Output sinks for evaluator narration.
 */

export interface OutputSink {
  writeLine(line: string): void;
}

/** Writes each line to standard output. */
export class ConsoleSink implements OutputSink {
  writeLine(line: string): void {
    console.log(line);
  }
}

/** Collects lines in memory, mainly for tests. */
export class BufferSink implements OutputSink {
  readonly lines: string[] = [];

  writeLine(line: string): void {
    this.lines.push(line);
  }

  text(): string {
    return this.lines.map(l => l + '\n').join('');
  }

  clear(): void {
    this.lines.length = 0;
  }
}

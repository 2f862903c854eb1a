/**
 * Streams a command runs against. `process` in production, in-memory in tests.
 */
export interface CliIo {
  readonly stdin: NodeJS.ReadableStream;
  readonly stdout: TextSink;
  readonly stderr: TextSink;
}

export interface TextSink {
  write(chunk: string): boolean;
}

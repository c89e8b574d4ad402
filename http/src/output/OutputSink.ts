/**
 * Destination for query output. Failures while writing belong to the sink.
 */
export interface OutputSink {
  write(chunk: string): void;
}

/**
 * Sink that collects everything written into one string.
 */
export interface BufferSink extends OutputSink {
  toString(): string;
}

export const createStdoutSink = (): OutputSink => ({
  write: (chunk) => {
    process.stdout.write(chunk);
  },
});

/**
 * @example
 * const sink = createBufferSink();
 * writeLines(sink, ["a", "b"]);
 * sink.toString(); // "a\nb\n"
 */
export const createBufferSink = (): BufferSink => {
  const chunks: string[] = [];
  return {
    write: (chunk) => {
      chunks.push(chunk);
    },
    toString: () => chunks.join(""),
  };
};

/**
 * Write each line followed by a newline.
 */
export const writeLines = (sink: OutputSink, lines: readonly string[]): void => {
  for (const line of lines) {
    sink.write(`${line}\n`);
  }
};

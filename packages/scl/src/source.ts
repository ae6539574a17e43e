export type ScaleSource = string | Uint8Array | Iterable<string>;

export interface ScaleSink {
  write(chunk: string): void;
}

const decoder = new TextDecoder('utf-8');

export const splitLines = (text: string): string[] => {
  const lines = text.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
};

export const sourceLines = (source: ScaleSource): Iterable<string> => {
  if (typeof source === 'string') return splitLines(source);
  if (source instanceof Uint8Array) return splitLines(decoder.decode(source));
  return source;
};

/** Collects written chunks in memory. */
export class StringSink implements ScaleSink {
  private readonly chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  toString(): string {
    return this.chunks.join('');
  }
}

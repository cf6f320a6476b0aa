/**
 * Builds a bounded, line-numbered view of a long log: the first and last
 * halves of `maxLines`, with a marker naming how many lines were dropped.
 */
export function excerptLog(log: string, maxLines = 600): string {
  const lines = log.replace(/\r\n/g, '\n').replace(/\n$/, '').split('\n');
  const numbered = lines.map((line, i) => `${i + 1}: ${line}`);

  if (numbered.length <= maxLines) {
    return numbered.join('\n');
  }

  const head = Math.ceil(maxLines / 2);
  const tail = maxLines - head;
  const omitted = numbered.length - head - tail;
  return [
    ...numbered.slice(0, head),
    `[... ${omitted} lines omitted ...]`,
    ...(tail > 0 ? numbered.slice(-tail) : []),
  ].join('\n');
}

/**
 * Returns the trailing `maxLines` lines of a log without numbering.
 */
export function tailLines(log: string, maxLines: number): string {
  const lines = log.replace(/\n$/, '').split('\n');
  return lines.slice(-maxLines).join('\n');
}

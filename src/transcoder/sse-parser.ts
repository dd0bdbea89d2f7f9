/**
 * Incremental SSE decoder.
 *
 * Accepts bytes in arbitrary fragments (split lines, split UTF-8 sequences)
 * and returns the `data` payload of every complete event.
 *
 * @packageDocumentation
 */

export class SseDecoder {
  private readonly decoder = new TextDecoder();
  private buffer = '';
  private dataLines: string[] = [];

  /** Feed bytes; returns the payloads of events completed by them. */
  push(bytes: Uint8Array): string[] {
    this.buffer += this.decoder.decode(bytes, { stream: true });

    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? ''; // Keep incomplete line in buffer

    const events: string[] = [];
    for (const line of lines) {
      const payload = this.consumeLine(line.endsWith('\r') ? line.slice(0, -1) : line);
      if (payload !== null) events.push(payload);
    }
    return events;
  }

  /** End of input: flush a trailing unterminated event, if any. */
  end(): string[] {
    this.buffer += this.decoder.decode();
    const events: string[] = [];

    if (this.buffer.length > 0) {
      const rest = this.buffer.endsWith('\r') ? this.buffer.slice(0, -1) : this.buffer;
      this.buffer = '';
      const payload = this.consumeLine(rest);
      if (payload !== null) events.push(payload);
    }
    const trailing = this.dispatch();
    if (trailing !== null) events.push(trailing);
    return events;
  }

  private consumeLine(line: string): string | null {
    if (line === '') return this.dispatch();
    if (line.startsWith(':')) return null;

    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    if (field !== 'data') return null;

    let value = colon === -1 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) value = value.slice(1);
    this.dataLines.push(value);
    return null;
  }

  private dispatch(): string | null {
    if (this.dataLines.length === 0) return null;
    const payload = this.dataLines.join('\n');
    this.dataLines = [];
    return payload;
  }
}

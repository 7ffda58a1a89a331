/**
 * One record of a `text/event-stream` body.
 */
export interface ServerSentEvent {
  event: string;
  data: string;
  id?: string;
}

const LINE_END = /\r\n|\r|\n/;

/**
 * Splits a `text/event-stream` body into events, one per blank-line boundary.
 * A final event without its trailing blank line is still emitted.
 */
export async function* readServerSentEvents(chunks: AsyncIterable<Uint8Array>): AsyncGenerator<ServerSentEvent> {
  const decoder = new TextDecoder();
  let buffer = '';
  let event = 'message';
  let data: string[] = [];
  let id: string | undefined;

  function* takeLines(atEnd: boolean): Generator<string> {
    for (;;) {
      const match = LINE_END.exec(buffer);
      if (!match) {
        return;
      }
      // A lone trailing \r may be the first half of \r\n.
      if (!atEnd && match[0] === '\r' && match.index === buffer.length - 1) {
        return;
      }
      yield buffer.slice(0, match.index);
      buffer = buffer.slice(match.index + match[0].length);
    }
  }

  function accept(line: string): ServerSentEvent | undefined {
    if (line === '') {
      if (data.length === 0) {
        event = 'message';
        return undefined;
      }
      const dispatched: ServerSentEvent = { event, data: data.join('\n'), id };
      event = 'message';
      data = [];
      return dispatched;
    }
    if (line.startsWith(':')) {
      return undefined;
    }

    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) {
      value = value.slice(1);
    }

    switch (field) {
      case 'data':
        data.push(value);
        break;
      case 'event':
        event = value;
        break;
      case 'id':
        id = value;
        break;
    }
    return undefined;
  }

  for await (const chunk of chunks) {
    buffer += decoder.decode(chunk, { stream: true });
    for (const line of takeLines(false)) {
      const dispatched = accept(line);
      if (dispatched) {
        yield dispatched;
      }
    }
  }

  buffer += decoder.decode();
  for (const line of takeLines(true)) {
    const dispatched = accept(line);
    if (dispatched) {
      yield dispatched;
    }
  }
  if (buffer.length > 0) {
    accept(buffer);
    buffer = '';
  }
  const last = accept('');
  if (last) {
    yield last;
  }
}

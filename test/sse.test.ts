import { expect } from 'chai';
import 'mocha';
import { readServerSentEvents, type ServerSentEvent } from '../src/sse';

async function parse(...chunks: string[]): Promise<ServerSentEvent[]> {
    async function* source(): AsyncGenerator<Uint8Array> {
        for (const chunk of chunks) {
            yield Buffer.from(chunk, 'utf8');
        }
    }
    const events: ServerSentEvent[] = [];
    for await (const event of readServerSentEvents(source())) {
        events.push(event);
    }
    return events;
}

describe('readServerSentEvents', () => {
    it('should split events on blank lines', async () => {
        const events = await parse('data: {"a":1}\n\ndata: {"a":2}\n\n');

        expect(events).to.deep.equal([
            { event: 'message', data: '{"a":1}', id: undefined },
            { event: 'message', data: '{"a":2}', id: undefined }
        ]);
    });

    it('should join events split across chunks, including a split CRLF', async () => {
        const events = await parse('da', 'ta: hel', 'lo\r', '\n\r\n');

        expect(events).to.deep.equal([{ event: 'message', data: 'hello', id: undefined }]);
    });

    it('should keep the event name and id and skip comments', async () => {
        const events = await parse(': keep-alive\n\nevent: error\nid: 7\ndata: {"details":"boom"}\n\n');

        expect(events).to.deep.equal([{ event: 'error', data: '{"details":"boom"}', id: '7' }]);
    });

    it('should join multi-line data with newlines', async () => {
        const events = await parse('data: first\ndata: second\n\n');

        expect(events.map((event) => event.data)).to.deep.equal(['first\nsecond']);
    });

    it('should emit a final event without a trailing blank line', async () => {
        const events = await parse('data: one\n\ndata: two');

        expect(events.map((event) => event.data)).to.deep.equal(['one', 'two']);
    });

    it('should reset the event name after a dispatch', async () => {
        const events = await parse('event: progress\ndata: 1\n\ndata: 2\n\n');

        expect(events.map((event) => event.event)).to.deep.equal(['progress', 'message']);
    });
});

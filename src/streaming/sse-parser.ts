/**
 * SSE stream parser for OpenAI-compatible streaming responses.
 * Handles buffering of partial chunks across TCP reads.
 */

/** A single complete SSE event. */
export interface SSEEvent {
  /** Value of the `event:` field, if the frame had one. */
  event?: string;
  /** Joined `data:` lines of the frame. */
  data: string;
}

/** Result of parsing an SSE chunk. */
export interface SSEParseResult {
  /** Complete SSE events (NOT including the [DONE] sentinel). */
  events: SSEEvent[];
  /** True if [DONE] marker was encountered. */
  done: boolean;
}

/** Stateful parser returned by createSSEParser(). */
export interface SSEParser {
  /** Feed the next decoded chunk of the body. */
  parse(chunk: string): SSEParseResult;
  /** Parse whatever is left in the buffer once the body has ended. */
  flush(): SSEParseResult;
}

/**
 * Parse one event block (the text between blank lines).
 * Returns null for comments/keepalives and blocks without data.
 */
function parseBlock(block: string): SSEEvent | 'done' | null {
  const dataLines: string[] = [];
  let event: string | undefined;

  for (const line of block.split('\n')) {
    if (!line || line.startsWith(':')) continue; // SSE comment / keepalive

    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) value = value.slice(1);

    if (field === 'data') {
      dataLines.push(value);
    } else if (field === 'event') {
      event = value;
    }
    // Ignore id:, retry: fields (not used by OpenAI format)
  }

  if (dataLines.length === 0) return null;

  const data = dataLines.join('\n');
  if (data === '[DONE]') return 'done';

  return event === undefined ? { data } : { event, data };
}

/**
 * Create a stateful SSE parser that handles partial chunks.
 * Call parse() for each chunk received from the ReadableStream.
 * The parser buffers incomplete events across calls.
 */
export function createSSEParser(): SSEParser {
  let buffer = '';
  // A chunk may end between the \r and \n of a CRLF pair
  let pendingCR = false;

  function drain(blocks: string[]): SSEParseResult {
    const events: SSEEvent[] = [];
    let done = false;

    for (const block of blocks) {
      const parsed = parseBlock(block);
      if (parsed === 'done') {
        done = true;
      } else if (parsed) {
        events.push(parsed);
      }
    }

    return { events, done };
  }

  return {
    parse(chunk: string): SSEParseResult {
      let text = pendingCR ? `\r${chunk}` : chunk;
      pendingCR = text.endsWith('\r');
      if (pendingCR) text = text.slice(0, -1);
      buffer += text.replace(/\r\n?/g, '\n');

      // Split on double newline (SSE event boundary)
      const parts = buffer.split('\n\n');

      // Last part may be incomplete -- keep it in buffer
      buffer = parts.pop() ?? '';

      return drain(parts);
    },

    flush(): SSEParseResult {
      const rest = buffer;
      buffer = '';
      pendingCR = false;
      return drain(rest.trim() ? [rest] : []);
    },
  };
}

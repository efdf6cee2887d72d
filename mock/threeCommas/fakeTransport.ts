/**
 * @module mock/threeCommas/fakeTransport.ts
 * @description Scripted HTTP transport: records every request and answers from a queue.
 */
import type { HttpRequest, HttpResponse, HttpTransport } from '../../src/services/httpTransport/types.js';

type ScriptedAnswer = HttpResponse | Error | ((request: HttpRequest) => HttpResponse);

export interface FakeTransport extends HttpTransport {
  readonly requests: ReadonlyArray<HttpRequest>;
  /** Queues answers, consumed one per request in order */
  enqueue(...answers: ReadonlyArray<ScriptedAnswer>): void;
  /** Answer used once the queue is empty */
  setFallback(answer: ScriptedAnswer): void;
}

export function jsonResponse(
  body: unknown,
  statusCode: number = 200,
  headers: Record<string, string | undefined> = {},
): HttpResponse {
  return { statusCode, headers, body: JSON.stringify(body) };
}

export function createFakeTransport(): FakeTransport {
  const requests: HttpRequest[] = [];
  const queue: ScriptedAnswer[] = [];
  let fallback: ScriptedAnswer = new Error('no scripted answer');

  async function send(request: HttpRequest): Promise<HttpResponse> {
    requests.push(request);
    const answer = queue.shift() ?? fallback;
    if (answer instanceof Error) {
      throw answer;
    }
    return typeof answer === 'function' ? answer(request) : answer;
  }

  return {
    requests,
    send,
    enqueue(...answers) {
      queue.push(...answers);
    },
    setFallback(answer) {
      fallback = answer;
    },
  };
}

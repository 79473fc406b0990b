import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import { Test, TestingModule } from '@nestjs/testing';

import { AIService } from '../ai/index.js';
import { RetrievalService, type RetrievalResult } from '../retrieval/index.js';
import { ChatStreamError } from './chat.errors.js';
import { ChatService } from './chat.service.js';

type RetrieveFn = RetrievalService['retrieve'];
type StreamTextFn = AIService['streamText'];

function result(
  documentId: string,
  ordinal: number,
  text: string,
  score: number,
): RetrievalResult {
  return {
    chunk: {
      chunkId: `${documentId}:v1:${ordinal}`,
      documentId,
      version: 1,
      ordinal,
      startOffset: 0,
      endOffset: text.length,
      text,
      sourceName: `${documentId}.md`,
    },
    score,
    vectorScore: score,
    keywordScore: 0,
    normalizedVectorScore: 1,
    normalizedKeywordScore: 0,
    sourceName: `${documentId}.md`,
  };
}

async function* deltas(...parts: string[]): AsyncIterable<string> {
  for (const part of parts) {
    yield part;
  }
}

async function* failing(): AsyncIterable<string> {
  yield 'partial';
  throw new Error('upstream closed');
}

async function collect(stream: AsyncIterable<string>): Promise<string[]> {
  const collected: string[] = [];
  for await (const delta of stream) {
    collected.push(delta);
  }
  return collected;
}

describe('ChatService', () => {
  let service: ChatService;
  let retrieval: { retrieve: jest.MockedFunction<RetrieveFn> };
  let ai: { streamText: jest.MockedFunction<StreamTextFn> };

  beforeEach(async () => {
    retrieval = { retrieve: jest.fn<RetrieveFn>() };
    ai = { streamText: jest.fn<StreamTextFn>() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ChatService,
        { provide: RetrievalService, useValue: retrieval },
        { provide: AIService, useValue: ai },
      ],
    }).compile();

    service = module.get(ChatService);
  });

  it('numbers the retrieved passages as sources', async () => {
    retrieval.retrieve.mockResolvedValue([
      result('doc-a', 0, 'Refunds take five days.', 0.9),
      result('doc-b', 2, 'Refunds go to the original card.', 0.4),
    ]);
    ai.streamText.mockReturnValue(deltas('Five days [1].'));

    const { sources, stream } = await service.createChatStream({
      question: 'How long do refunds take?',
      topK: 2,
    });

    expect(sources).toEqual([
      {
        order: 1,
        documentId: 'doc-a',
        chunkId: 'doc-a:v1:0',
        title: 'doc-a.md',
        score: 0.9,
      },
      {
        order: 2,
        documentId: 'doc-b',
        chunkId: 'doc-b:v1:2',
        title: 'doc-b.md',
        score: 0.4,
      },
    ]);
    expect(await collect(stream)).toEqual(['Five days [1].']);
    expect(retrieval.retrieve).toHaveBeenCalledWith(
      'How long do refunds take?',
      { k: 2, signal: undefined },
    );
  });

  it('sends the passages and the question in the final user message', async () => {
    retrieval.retrieve.mockResolvedValue([
      result('doc-a', 0, '  Refunds take five days.  ', 0.9),
    ]);
    ai.streamText.mockReturnValue(deltas());

    await service.createChatStream({ question: 'How long do refunds take?' });

    const [options] = ai.streamText.mock.calls[0];
    expect(options.temperature).toBe(0.2);
    expect(options.messages[0].role).toBe('system');
    expect(options.messages[options.messages.length - 1]).toEqual({
      role: 'user',
      content:
        'Passages:\n\n[1] doc-a.md\nRefunds take five days.\n\nQuestion: How long do refunds take?',
    });
  });

  it('tells the model when nothing was retrieved', async () => {
    retrieval.retrieve.mockResolvedValue([]);
    ai.streamText.mockReturnValue(deltas());

    const { sources } = await service.createChatStream({
      question: 'Where is the office?',
    });

    expect(sources).toEqual([]);
    const [options] = ai.streamText.mock.calls[0];
    expect(options.messages[options.messages.length - 1].content).toBe(
      'Question: Where is the office?\n\nNo passages were found in the knowledge base.',
    );
  });

  it('searches follow-up questions together with the previous user question', async () => {
    retrieval.retrieve.mockResolvedValue([]);
    ai.streamText.mockReturnValue(deltas());

    await service.createChatStream({
      question: 'What about refunds?',
      history: [
        { role: 'user', content: 'How do I cancel an order?' },
        { role: 'assistant', content: 'Use the orders page.' },
      ],
    });

    expect(retrieval.retrieve.mock.calls[0][0]).toBe(
      'How do I cancel an order? What about refunds?',
    );
    const [options] = ai.streamText.mock.calls[0];
    expect(options.messages.map((message) => message.role)).toEqual([
      'system',
      'user',
      'assistant',
      'user',
    ]);
  });

  it('searches standalone questions as they are', async () => {
    retrieval.retrieve.mockResolvedValue([]);
    ai.streamText.mockReturnValue(deltas());

    await service.createChatStream({
      question: 'How long does shipping to Canada take?',
      history: [{ role: 'user', content: 'How do I cancel an order?' }],
    });

    expect(retrieval.retrieve.mock.calls[0][0]).toBe(
      'How long does shipping to Canada take?',
    );
  });

  it('wraps generation failures in a stream error', async () => {
    retrieval.retrieve.mockResolvedValue([]);
    ai.streamText.mockReturnValue(failing());

    const { stream } = await service.createChatStream({ question: 'Hello there friend' });
    const received: string[] = [];

    const consume = async () => {
      for await (const delta of stream) {
        received.push(delta);
      }
    };

    await expect(consume()).rejects.toBeInstanceOf(ChatStreamError);
    expect(received).toEqual(['partial']);
  });

  it('propagates retrieval failures before streaming starts', async () => {
    retrieval.retrieve.mockRejectedValue(new Error('embedding unavailable'));

    await expect(
      service.createChatStream({ question: 'How long do refunds take?' }),
    ).rejects.toThrow('embedding unavailable');
    expect(ai.streamText).not.toHaveBeenCalled();
  });
});

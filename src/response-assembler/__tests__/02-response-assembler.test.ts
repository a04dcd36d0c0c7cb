/**
 * Response Assembler tests: streaming, commit, reroll, failure, cancellation
 */

import { ContextStore } from '../../context-store/ContextStore';
import { InMemoryFileSystem } from '../../context-store/FileSystem';
import type { Message } from '../../context-store/types';
import { GenerationFailedError } from '../../errors';
import { HandlerRegistry } from '../../handler-registry/HandlerRegistry';
import { ResponseAssembler } from '../ResponseAssembler';
import type { AssemblyRequest, Chunk, ResponseAssemblerConfig } from '../types';
import { BASE_TIME, ScriptedBackend, descriptor, humanMessage, noSleep } from '../../testing';

describe('ResponseAssembler', () => {
  let store: ContextStore;
  let registry: HandlerRegistry;
  let backend: ScriptedBackend;
  let assembler: ResponseAssembler;
  let sleep: jest.Mock<Promise<void>, [number]>;
  let inbound: Message;
  let received: Chunk[];

  const sink = (chunk: Chunk) => {
    received.push(chunk);
  };

  function request(overrides: Partial<AssemblyRequest> = {}): AssemblyRequest {
    return {
      handler: registry.resolve('gemini'),
      systemPrompt: 'You are Gemini.',
      window: [],
      message: inbound,
      sampling: {},
      ...overrides,
    };
  }

  async function responses(): Promise<Message[]> {
    return (await store.window('general', 50)).filter(m => m.isResponse);
  }

  beforeEach(async () => {
    store = new ContextStore(new InMemoryFileSystem(), {
      storageDir: '/state',
      defaultWindowSize: 10,
      maxWindowSize: 50,
    });
    await store.init();

    registry = new HandlerRegistry([
      descriptor({ handlerId: 'gemini', displayName: 'Gemini' }),
      descriptor({ handlerId: 'sonar', displayName: 'Sonar', temperature: 0.3 }),
      descriptor({ handlerId: 'ministral', isDefaultFallback: true }),
    ]);

    backend = new ScriptedBackend();
    sleep = jest.fn<Promise<void>, [number]>(noSleep);
    let nextId = 0;
    const config: ResponseAssemblerConfig = {
      chunker: { minChunkChars: 80, maxSentencesPerChunk: 3 },
      pacing: { enabled: true, baseDelayMs: 250, perCharDelayMs: 8, maxDelayMs: 1500 },
      reroll: { temperatureStep: 0.2, maxTemperature: 1.5 },
      defaultTemperature: 0.7,
      botAuthorId: 'crosstalk',
      sleep,
      now: () => BASE_TIME + 1000,
      newId: () => `resp-${++nextId}`,
    };
    assembler = new ResponseAssembler(backend, store, registry, config);

    inbound = await store.append(humanMessage({ id: 'm1', body: 'compare apples and pears' }));
    received = [];
  });

  describe('run', () => {
    it('should stream chunks and persist the response once', async () => {
      backend.enqueue(['Apples are sweet. ', 'Pears are softer. Both', ' are fruit.']);

      const { stream, message } = await assembler.run(request(), sink);

      expect(received).toEqual([
        { text: 'Apples are sweet. Pears are softer. Both are fruit.', index: 0, sentences: 3 },
      ]);
      expect(message).toEqual({
        id: 'resp-1',
        channelId: 'general',
        authorId: 'crosstalk',
        authorDisplayName: 'Gemini',
        body: 'Apples are sweet. Pears are softer. Both are fruit.',
        attachments: [],
        createdAt: BASE_TIME + 1000,
        handlerId: 'gemini',
        isResponse: true,
      });
      expect(stream.state).toBe('committed');
      expect(await stream.commit()).toBe(message);
      expect(await store.count('general')).toBe(2);
    });

    it('should pace after each chunk emitted while streaming', async () => {
      backend.enqueue(['A. B. C. ', 'D. E. F. ', 'G.']);

      await assembler.run(request(), sink);

      expect(received.map(c => c.text)).toEqual(['A. B. C.', 'D. E. F.', 'G.']);
      expect(received.map(c => c.index)).toEqual([0, 1, 2]);
      expect(sleep.mock.calls).toEqual([[314], [314]]);
    });

    it('should leave the response uncommitted when asked', async () => {
      backend.enqueue(['Done. ']);

      const { stream, message } = await assembler.run(request(), sink, { autoCommit: false });

      expect(message).toBeNull();
      expect(stream.state).toBe('completed');
      expect(await responses()).toHaveLength(0);
    });

    it('should send the handler model, prompt and temperature to the backend', async () => {
      backend.enqueue(['Ok. ']);
      await assembler.run(request({ handler: registry.resolve('sonar') }), sink);

      expect(backend.requests[0]).toMatchObject({
        handlerId: 'sonar',
        model: 'test/sonar',
        systemPrompt: 'You are Gemini.',
        history: [],
        message: { text: 'Alice: compare apples and pears', imageUrls: [] },
        sampling: { temperature: 0.3 },
      });
    });

    it('should prefer the requested temperature', async () => {
      backend.enqueue(['Ok. ']);
      await assembler.run(request({ sampling: { temperature: 1.1 } }), sink);
      expect(backend.requests[0].sampling.temperature).toBe(1.1);
    });
  });

  describe('reroll', () => {
    it('should leave zero responses when rerolled before commit', async () => {
      backend.enqueue(['First try. '], ['Second try. ']);

      const first = assembler.invoke(request());
      await first.pipeTo(sink);
      expect(first.state).toBe('completed');

      const second = assembler.reroll(first);
      expect(first.state).toBe('discarded');
      await expect(first.commit()).rejects.toThrow('cannot commit a discarded response');

      await second.pipeTo(sink);
      expect(await responses()).toHaveLength(0);

      await second.commit();
      const stored = await responses();
      expect(stored.map(m => m.body)).toEqual(['Second try.']);
    });

    it('should reuse the prompt and window with a raised temperature', async () => {
      const window = [humanMessage({ id: 'm0', body: 'earlier' })];
      backend.enqueue(['One. '], ['Two. ']);

      const first = assembler.invoke(request({ window }));
      await first.pipeTo(sink);
      await assembler.reroll(first).pipeTo(sink);

      const [original, rerolled] = backend.requests;
      expect(rerolled.systemPrompt).toBe(original.systemPrompt);
      expect(rerolled.history).toEqual(original.history);
      expect(rerolled.history).toEqual([{ role: 'user', content: 'Alice: earlier' }]);
      expect(original.sampling.temperature).toBe(0.7);
      expect(rerolled.sampling.temperature).toBe(0.9);
    });

    it('should append a second response when rerolled after commit', async () => {
      backend.enqueue(['Old answer. '], ['New answer. ']);

      const { stream } = await assembler.run(request(), sink);
      const { message } = await assembler.rerollAndRun(stream, sink, { temperature: 1.2 });

      expect(stream.state).toBe('committed');
      expect(message?.id).toBe('resp-2');
      expect(backend.requests[1].sampling.temperature).toBe(1.2);
      expect((await responses()).map(m => m.body)).toEqual(['Old answer.', 'New answer.']);
    });

    it('should cap the temperature step', () => {
      expect(assembler.nextTemperature(0.7)).toBe(0.9);
      expect(assembler.nextTemperature(1.4)).toBe(1.5);
      expect(assembler.nextTemperature(1.5)).toBe(1.5);
    });
  });

  describe('failures', () => {
    it('should surface a generation failure without touching the store', async () => {
      backend.enqueue({
        fragments: ['Half a sentence. '],
        error: new GenerationFailedError('rate_limited', 'slow down', { statusCode: 429 }),
      });

      const stream = assembler.invoke(request());
      await expect(stream.pipeTo(sink)).rejects.toMatchObject({ kind: 'rate_limited', statusCode: 429 });

      expect(stream.state).toBe('failed');
      expect(stream.error?.kind).toBe('rate_limited');
      await expect(stream.commit()).rejects.toThrow('cannot commit a failed response');
      expect(await store.count('general')).toBe(1);
    });

    it('should wrap unexpected errors as network failures', async () => {
      backend.enqueue({ fragments: [], error: new Error('socket hang up') });

      await expect(assembler.run(request(), sink)).rejects.toMatchObject({
        kind: 'network',
        message: 'socket hang up',
      });
      expect(await responses()).toHaveLength(0);
    });

    it('should fail an empty response', async () => {
      backend.enqueue(['  ']);

      await expect(assembler.run(request(), sink)).rejects.toMatchObject({
        kind: 'network',
        message: 'Handler returned an empty response',
      });
      expect(await responses()).toHaveLength(0);
    });
  });

  describe('cancellation', () => {
    it('should stop and skip persistence when the caller aborts', async () => {
      const controller = new AbortController();
      backend.enqueue(['One. Two. Three. ', 'Four. Five. Six. ']);

      const stream = assembler.invoke(request({ signal: controller.signal }));
      await stream.pipeTo(chunk => {
        received.push(chunk);
        controller.abort();
      });

      expect(stream.state).toBe('cancelled');
      expect(received.map(c => c.text)).toEqual(['One. Two. Three.']);
      await expect(stream.commit()).rejects.toThrow('cannot commit a cancelled response');
      expect(await store.count('general')).toBe(1);
    });

    it('should release the caller signal once the stream ends', async () => {
      const controller = new AbortController();
      const removeListener = jest.spyOn(controller.signal, 'removeEventListener');
      backend.enqueue(['Done. ']);

      const stream = assembler.invoke(request({ signal: controller.signal }));
      await stream.pipeTo(sink);
      expect(removeListener).toHaveBeenCalledWith('abort', expect.any(Function));

      controller.abort();
      expect(stream.state).toBe('completed');
      await expect(stream.commit()).resolves.toMatchObject({ body: 'Done.' });
    });

    it('should release the caller signal of a discarded stream', () => {
      const controller = new AbortController();
      const removeListener = jest.spyOn(controller.signal, 'removeEventListener');

      const stream = assembler.invoke(request({ signal: controller.signal }));
      stream.discard();

      expect(removeListener).toHaveBeenCalledWith('abort', expect.any(Function));
    });

    it('should run a reroll under its own signal', async () => {
      const earlier = new AbortController();
      backend.enqueue(['First. '], ['Second. ']);

      const first = assembler.invoke(request({ signal: earlier.signal }));
      await first.pipeTo(sink);
      earlier.abort();

      const second = assembler.reroll(first);
      await second.pipeTo(sink);
      expect(second.state).toBe('completed');

      const later = new AbortController();
      later.abort();
      const third = assembler.reroll(second, {}, { signal: later.signal });
      backend.enqueue(['Third. ']);
      await third.pipeTo(sink);
      expect(third.state).toBe('cancelled');
    });

    it('should cancel when the consumer stops iterating', async () => {
      backend.enqueue(['One. Two. Three. ', 'Four. Five. Six. ']);

      const stream = assembler.invoke(request());
      for await (const chunk of stream) {
        received.push(chunk);
        break;
      }

      expect(stream.state).toBe('cancelled');
      expect(await responses()).toHaveLength(0);
    });

    it('should refuse to iterate a stream twice', async () => {
      backend.enqueue(['Once. ']);
      const stream = assembler.invoke(request());
      await stream.pipeTo(sink);

      await expect(stream.pipeTo(sink)).rejects.toThrow('cannot iterate a completed response');
    });
  });
});

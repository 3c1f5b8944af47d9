import { ThrowCompletion } from '../src/internal/completion_record';
import { RequestQueue, ResumptionRequest } from '../src/internal/request_queue';

describe('RequestQueue', () => {
  it('starts empty', () => {
    const queue = new RequestQueue<string>();
    expect(queue.isEmpty()).toBe(true);
    expect(queue.size).toBe(0);
  });

  it('pops requests in the order they were enqueued', () => {
    const queue = new RequestQueue<string>();
    queue.enqueue(new ResumptionRequest(1, 'a'));
    queue.enqueue(new ResumptionRequest(2, 'b'));
    queue.enqueue(new ResumptionRequest(ThrowCompletion('x'), 'c'));
    expect(queue.size).toBe(3);
    expect(queue.peekHead().Deferred).toBe('a');
    expect(queue.popHead().Deferred).toBe('a');
    expect(queue.popHead().Deferred).toBe('b');
    expect(queue.peekHead().Deferred).toBe('c');
    expect(queue.size).toBe(1);
    expect(queue.popHead().Deferred).toBe('c');
    expect(queue.isEmpty()).toBe(true);
  });

  it('keeps the head in place when peeking', () => {
    const queue = new RequestQueue<number>();
    queue.enqueue(new ResumptionRequest(undefined, 7));
    expect(queue.peekHead()).toBe(queue.peekHead());
    expect(queue.size).toBe(1);
  });

  it('stays FIFO across compaction', () => {
    const queue = new RequestQueue<number>();
    const popped: number[] = [];
    for (let i = 0; i < 100; i++) {
      queue.enqueue(new ResumptionRequest(i, i));
      if (i % 3 === 2) {
        popped.push(queue.popHead().Deferred);
        popped.push(queue.popHead().Deferred);
      }
    }
    while (!queue.isEmpty()) popped.push(queue.popHead().Deferred);
    expect(popped).toEqual(Array.from({length: 100}, (_, i) => i));
  });

  it('rejects popping an empty queue', () => {
    const queue = new RequestQueue<string>();
    expect(() => queue.popHead()).toThrow('Assertion failed: peek on empty request queue');
    queue.enqueue(new ResumptionRequest(1, 'a'));
    queue.popHead();
    expect(() => queue.peekHead()).toThrow('Assertion failed');
  });
});

describe('ResumptionRequest', () => {
  it('can be settled exactly once', () => {
    const request = new ResumptionRequest(undefined, 'd');
    expect(request.Settled).toBe(false);
    request.markSettled();
    expect(request.Settled).toBe(true);
    expect(() => request.markSettled()).toThrow('Assertion failed: request settled twice');
  });
});

import { describe, it, expect } from 'vitest';
import { MessageQueue } from './channel';

describe('MessageQueue', () => {
  it('should drain messages in arrival order', () => {
    const queue = new MessageQueue<number>();
    queue.post(1);
    queue.post(2);
    queue.post(3);

    expect(queue.size).toBe(3);
    expect(queue.drain()).toEqual([1, 2, 3]);
    expect(queue.drain()).toEqual([]);
    expect(queue.size).toBe(0);
  });

  it('should refuse posts after close', () => {
    const queue = new MessageQueue<string>();
    queue.post('kept until close');
    queue.close();

    expect(queue.post('late')).toBe(false);
    expect(queue.isClosed).toBe(true);
    expect(queue.drain()).toEqual([]);
  });
});

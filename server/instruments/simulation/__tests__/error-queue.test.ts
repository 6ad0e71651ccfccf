import { describe, it, expect } from 'vitest';
import { createErrorQueue } from '../error-queue.js';

describe('ErrorQueue', () => {
  it('should report "no error" when empty', () => {
    const queue = createErrorQueue();
    expect(queue.next()).toBe('+0,"No error"');
    expect(queue.size).toBe(0);
  });

  it('should drain errors oldest first', () => {
    const queue = createErrorQueue();
    queue.push(-222, 'Data out of range');
    queue.push(-113, 'Undefined header');

    expect(queue.size).toBe(2);
    expect(queue.next()).toBe('-222,"Data out of range"');
    expect(queue.next()).toBe('-113,"Undefined header"');
    expect(queue.next()).toBe('+0,"No error"');
  });

  it('should pop structured entries', () => {
    const queue = createErrorQueue();
    queue.push(-350, 'Queue overflow');
    expect(queue.pop()).toEqual({ code: -350, message: 'Queue overflow' });
    expect(queue.pop()).toBeUndefined();
  });

  it('should keep every queued error', () => {
    const queue = createErrorQueue();
    for (let i = 0; i < 100; i++) queue.push(-100 - i, `error ${i}`);
    expect(queue.size).toBe(100);
  });

  it('should clear', () => {
    const queue = createErrorQueue();
    queue.push(-222, 'Data out of range');
    queue.clear();
    expect(queue.size).toBe(0);
    expect(queue.next()).toBe('+0,"No error"');
  });
});

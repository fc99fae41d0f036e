import { describe, expect, it } from 'vitest'
import { FifoQueue } from './fifo-queue'

describe('FifoQueue', () => {
  it('returns items in insertion order', () => {
    const queue = new FifoQueue<string>()
    queue.push('a')
    queue.push('b')
    queue.push('c')

    expect(queue.length).toBe(3)
    expect(queue.first()).toBe('a')
    expect(queue.last()).toBe('c')
    expect(queue.at(1)).toBe('b')
    expect(queue.shift()).toBe('a')
    expect(queue.shift()).toBe('b')
    expect(queue.length).toBe(1)
    expect([...queue]).toEqual(['c'])
  })

  it('keeps order across compaction', () => {
    const queue = new FifoQueue<number>()
    for (let i = 0; i < 3000; i += 1) {
      queue.push(i)
    }
    for (let i = 0; i < 2000; i += 1) {
      expect(queue.shift()).toBe(i)
    }

    expect(queue.length).toBe(1000)
    expect(queue.first()).toBe(2000)
    expect(queue.last()).toBe(2999)
    expect(queue.at(500)).toBe(2500)
    expect([...queue]).toHaveLength(1000)
  })

  it('throws when reading from an empty queue', () => {
    const queue = new FifoQueue<number>()
    expect(() => queue.shift()).toThrow('Cannot shift from an empty queue')
    expect(() => queue.first()).toThrow(RangeError)
  })

  it('rejects out of range indexes', () => {
    const queue = new FifoQueue<number>()
    queue.push(1)
    expect(() => queue.at(1)).toThrow('Index 1 out of range for queue of length 1')
    expect(() => queue.at(-1)).toThrow(RangeError)
  })

  it('clears all items', () => {
    const queue = new FifoQueue<number>()
    queue.push(1)
    queue.push(2)
    queue.clear()
    expect(queue.length).toBe(0)
    expect([...queue]).toEqual([])
  })
})

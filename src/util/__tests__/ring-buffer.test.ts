import { describe, it, expect } from 'vitest'
import { RingBuffer } from '../ring-buffer.js'

describe('RingBuffer', () => {
  it('keeps items oldest first', () => {
    const buffer = new RingBuffer<number>(3)
    buffer.push(1)
    buffer.push(2)
    expect(buffer.toArray()).toEqual([1, 2])
    expect(buffer.latest()).toBe(2)
  })

  it('evicts the oldest item past capacity and returns it', () => {
    const buffer = new RingBuffer<string>(2)
    expect(buffer.push('a')).toBeUndefined()
    expect(buffer.push('b')).toBeUndefined()
    expect(buffer.push('c')).toBe('a')
    expect(buffer.toArray()).toEqual(['b', 'c'])
    expect(buffer.size).toBe(2)
  })

  it('never grows beyond capacity', () => {
    const buffer = new RingBuffer<number>(20)
    for (let i = 0; i < 100; i++) buffer.push(i)
    expect(buffer.size).toBe(20)
    expect(buffer.toArray()[0]).toBe(80)
  })

  it('returns the last n items', () => {
    const buffer = new RingBuffer<number>(5)
    for (let i = 1; i <= 5; i++) buffer.push(i)
    expect(buffer.last(2)).toEqual([4, 5])
    expect(buffer.last(10)).toEqual([1, 2, 3, 4, 5])
    expect(buffer.last(0)).toEqual([])
  })

  it('returns a copy from toArray', () => {
    const buffer = new RingBuffer<number>(2)
    buffer.push(1)
    buffer.toArray().push(99)
    expect(buffer.toArray()).toEqual([1])
  })

  it('clears', () => {
    const buffer = new RingBuffer<number>(2)
    buffer.push(1)
    buffer.clear()
    expect(buffer.size).toBe(0)
    expect(buffer.latest()).toBeUndefined()
  })

  it('rejects a non-positive capacity', () => {
    expect(() => new RingBuffer(0)).toThrow('positive integer')
    expect(() => new RingBuffer(1.5)).toThrow('positive integer')
  })
})

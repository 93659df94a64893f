import { describe, expect, test } from 'vitest'
import { withCacheBuster } from '../stream-url'

describe('withCacheBuster', () => {
  test('adds the t parameter to a relative stream path', () => {
    expect(withCacheBuster('/stream', 1700000000000)).toBe(`${window.location.origin}/stream?t=1700000000000`)
  })

  test('replaces an earlier cache buster and keeps other parameters', () => {
    expect(withCacheBuster('http://camera.local:8800/stream?t=1&q=low', 2)).toBe('http://camera.local:8800/stream?t=2&q=low')
  })
})

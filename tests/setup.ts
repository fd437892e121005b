import { afterEach, beforeAll, vi } from 'vitest'

beforeAll(() => {
  // Increase stack trace limit for better error reporting
  Error.stackTraceLimit = 50
})

afterEach(() => {
  vi.useRealTimers()
  vi.restoreAllMocks()
})

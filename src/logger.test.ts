import { describe, expect, test, vi } from 'vitest'
import { createLogger } from './logger'

const capture = () => ({
  debug: vi.fn<(line: string) => void>(),
  info: vi.fn<(line: string) => void>(),
  warn: vi.fn<(line: string) => void>(),
  error: vi.fn<(line: string) => void>()
})

describe('createLogger', () => {
  test('drops messages below the threshold', () => {
    const sinks = capture()
    const log = createLogger('warn', sinks)

    log.debug('verbose')
    log.info('hello')
    log.warn('slow', { ms: 5 })
    log.error('broken')

    expect(sinks.debug).not.toHaveBeenCalled()
    expect(sinks.info).not.toHaveBeenCalled()
    expect(sinks.warn).toHaveBeenCalledTimes(1)
    expect(sinks.error).toHaveBeenCalledTimes(1)
  })

  test('formats a timestamp, the level and json fields', () => {
    const sinks = capture()
    createLogger('debug', sinks).warn('slow', { ms: 5 })

    expect(sinks.warn.mock.calls[0][0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] WARN slow \{"ms":5\}$/)
  })

  test('omits empty fields', () => {
    const sinks = capture()
    createLogger('info', sinks).info('ready', {})

    expect(sinks.info.mock.calls[0][0]).toMatch(/\] INFO ready$/)
  })

  test('print writes at info level', () => {
    const sinks = capture()
    createLogger('info', sinks).print('<-- GET /health')

    expect(sinks.info.mock.calls[0][0]).toMatch(/\] INFO <-- GET \/health$/)
  })

  test('silent writes nothing', () => {
    const sinks = capture()
    const log = createLogger('silent', sinks)
    log.error('broken')
    log.print('request')

    expect(sinks.error).not.toHaveBeenCalled()
    expect(sinks.info).not.toHaveBeenCalled()
  })
})

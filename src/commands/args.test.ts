import { describe, expect, it } from 'vitest'
import { parseArgs, parseIntegerFlag, parseListFlag, requireFlag, requirePositional } from './args'

describe('parseArgs', () => {
  it('separates flags from positional arguments', () => {
    const parsed = parseArgs(['worker1', '--from', 'worker2', 'hello', '--type=info', 'there'])

    expect(parsed.positional).toEqual(['worker1', 'hello', 'there'])
    expect(parsed.flags.get('from')).toBe('worker2')
    expect(parsed.flags.get('type')).toBe('info')
  })

  it('treats declared boolean flags as switches', () => {
    const parsed = parseArgs(['worker1', '--mark', '--json'], ['mark', 'json'])

    expect([...parsed.switches]).toEqual(['mark', 'json'])
    expect(parsed.positional).toEqual(['worker1'])
  })

  it('keeps everything after -- positional', () => {
    const parsed = parseArgs(['worker1', '--', '--not-a-flag', 'text'])
    expect(parsed.positional).toEqual(['worker1', '--not-a-flag', 'text'])
  })

  it('fails when a value is missing', () => {
    expect(() => parseArgs(['--from'])).toThrow('Missing value for --from')
  })
})

describe('flag helpers', () => {
  const parsed = parseArgs(['T1', '--bloom', '4', '--blocked-by', 'A, B,,C', '--level', 'x'])

  it('reads required values', () => {
    expect(requirePositional(parsed, 0, 'task-id')).toBe('T1')
    expect(() => requirePositional(parsed, 1, 'worker')).toThrow('<worker> is required')
    expect(() => requireFlag(parsed, 'id')).toThrow('--id is required')
  })

  it('parses integers and lists', () => {
    expect(parseIntegerFlag(parsed, 'bloom')).toBe(4)
    expect(parseIntegerFlag(parsed, 'missing')).toBeUndefined()
    expect(() => parseIntegerFlag(parsed, 'level')).toThrow('--level must be an integer, got x')
    expect(parseListFlag(parsed, 'blocked-by')).toEqual(['A', 'B', 'C'])
  })
})

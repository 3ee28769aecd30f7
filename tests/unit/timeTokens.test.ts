import { describe, expect, it, vi } from 'vitest'
import { substituteTokens } from '@/shared/utils/timeTokens'

// 2024-03-05 07:08:09 local time
const now = new Date(2024, 2, 5, 7, 8, 9)

describe('substituteTokens', () => {
  it('expands brace tokens', () => {
    expect(substituteTokens('{timestamp}', now)).toBe('2024-03-05_070809')
    expect(substituteTokens('out/{date}/{time}', now)).toBe('out/2024-03-05/070809')
    expect(substituteTokens('{unix}', now)).toBe(String(Math.floor(now.getTime() / 1000)))
  })

  it('keeps unknown brace tokens verbatim', () => {
    expect(substituteTokens('ComfyUI_{seed}_{date}', now)).toBe('ComfyUI_{seed}_2024-03-05')
  })

  it('keeps brace tokens named like object properties verbatim', () => {
    expect(substituteTokens('{valueOf}/out.png', now)).toBe('{valueOf}/out.png')
    expect(substituteTokens('{constructor}_{hasOwnProperty}', now)).toBe('{constructor}_{hasOwnProperty}')
    expect(substituteTokens('[time(%Y)]_{toString}', now)).toBe('2024_{toString}')
  })

  it('expands strftime directives inside [time(...)]', () => {
    expect(substituteTokens('renders/[time(%Y-%m-%d_%H%M%S)]', now)).toBe('renders/2024-03-05_070809')
    expect(substituteTokens('[time(%Y%%%Q)]', now)).toBe('2024%%Q')
    expect(substituteTokens('[time(%j)]', now)).toBe('065')
  })

  it('expands %date:pattern% with a date pattern', () => {
    expect(substituteTokens('img_%date:yyyyMMdd%', now)).toBe('img_20240305')
  })

  it('keeps a %date% token whose pattern cannot be formatted', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    expect(substituteTokens('%date:YYYY%', now)).toBe('%date:YYYY%')
    expect(warn).toHaveBeenLastCalledWith(expect.stringContaining('[timeTokens]'))
  })

  it('returns plain paths unchanged', () => {
    expect(substituteTokens('/var/lib/images', now)).toBe('/var/lib/images')
  })
})

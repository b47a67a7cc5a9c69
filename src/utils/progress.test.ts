import { createOptionalProgressBar, formatAge, formatBytes } from './progress'
import { describeBundle } from './prompt'

describe('formatBytes', () => {
  it('picks the largest fitting unit', () => {
    expect(formatBytes(512)).toBe('512.0 B')
    expect(formatBytes(1536)).toBe('1.5 KB')
    expect(formatBytes(1.5 * 1024 * 1024)).toBe('1.5 MB')
  })
})

describe('formatAge', () => {
  const now = new Date(2024, 2, 14, 12, 0, 0)

  it('describes recent times by day', () => {
    expect(formatAge(new Date(2024, 2, 14, 9, 30), now)).toBe('today 09:30')
    expect(formatAge(new Date(2024, 2, 13, 18, 5), now)).toBe('yesterday 18:05')
  })

  it('falls back to dates', () => {
    expect(formatAge(new Date(2024, 0, 5, 11, 0), now)).toBe('01-05 11:00')
    expect(formatAge(new Date(2023, 11, 31, 8, 0), now)).toBe('2023-12-31')
  })
})

describe('describeBundle', () => {
  it('shows position, name, size, age and file count', () => {
    const line = describeBundle(
      {
        label: 'docs',
        timestamp: new Date(2020, 0, 2, 9, 0, 0),
        filename: 'docs_20200102_090000.tar.gz',
        path: '/store/docs_20200102_090000.tar.gz',
        sizeBytes: 1536,
        fileCount: 3,
      },
      1
    )

    expect(line).toBe('  1. docs_20200102_090000.tar.gz (1.5 KB, 2020-01-02, 3 files)')
  })
})

describe('createOptionalProgressBar', () => {
  it('draws nothing unless enabled', () => {
    expect(createOptionalProgressBar(false, 10)).toBeUndefined()
    expect(typeof createOptionalProgressBar(true, 10)).toBe('function')
  })
})

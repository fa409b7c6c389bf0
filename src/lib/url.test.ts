import { describe, expect, it } from 'vitest'
import { isAbsoluteHttpUrl, isExcludedUrl, trimBaseUrl } from './url.js'

describe('isAbsoluteHttpUrl', () => {
  it.each(['https://example.com', 'http://example.com/a?b=c#d', 'https://127.0.0.1:8080/'])(
    'accepts %s',
    url => {
      expect(isAbsoluteHttpUrl(url)).toBe(true)
    }
  )

  it.each(['not a url', '', 'example.com', '/path', 'ftp://example.com', 'mailto:someone@example.com', 'http://'])(
    'rejects %j',
    url => {
      expect(isAbsoluteHttpUrl(url)).toBe(false)
    }
  )
})

describe('isExcludedUrl', () => {
  it('matches the archive hosts', () => {
    expect(isExcludedUrl('https://web.archive.org/web/2024/https://example.com')).toBe(true)
    expect(isExcludedUrl('https://ARCHIVE.PH/AbCdE')).toBe(true)
    expect(isExcludedUrl('http://archive.today/')).toBe(true)
  })

  it('leaves other hosts alone', () => {
    expect(isExcludedUrl('https://example.com')).toBe(false)
    expect(isExcludedUrl('https://blog.archive.org.example.com')).toBe(false)
    expect(isExcludedUrl('not a url')).toBe(false)
  })
})

describe('trimBaseUrl', () => {
  it('drops trailing slashes', () => {
    expect(trimBaseUrl('https://archive.today//')).toBe('https://archive.today')
    expect(trimBaseUrl('https://web.archive.org')).toBe('https://web.archive.org')
  })
})

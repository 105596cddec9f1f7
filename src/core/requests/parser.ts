import type { ArtifactParseResult, ParsedRequest } from './types.js'

export const DEFAULT_METHOD = 'POST'

const HEADER_SEPARATOR = ': '

function isComment(line: string): boolean {
  return line.startsWith('//') || line.startsWith('#')
}

function splitOnce(value: string, separator: string): [string, string] {
  const index = value.indexOf(separator)
  return [value.slice(0, index), value.slice(index + separator.length)]
}

/**
 * Parses a rendered request file:
 *
 *   artifact     = header-block "\n\n" body
 *   header-block = [ "//" comment "\n" ] request-line *( "\n" header-line )
 *   request-line = METHOD " " URL
 *   header-line  = name ": " value
 *
 * Only the first two lines are candidates for the request line, and a
 * leading `//` comment is only skipped in first position. Comment lines
 * anywhere in the block are never sent as headers.
 */
export function parseArtifact(text: string): ArtifactParseResult {
  const normalized = text.replace(/\r\n/g, '\n')
  const separator = normalized.indexOf('\n\n')
  if (separator === -1) {
    return { ok: false, error: 'missing-body', message: 'Invalid HTTP request format: missing body' }
  }

  const headerBlock = normalized.slice(0, separator)
  const body = normalized.slice(separator + 2)
  const lines = headerBlock.split('\n')

  let method = DEFAULT_METHOD
  let url: string | undefined
  for (const [index, line] of lines.entries()) {
    if (index === 0 && line.startsWith('//')) continue
    if (index > 1) break
    if (line.includes(' ') && !isComment(line)) {
      ;[method, url] = splitOnce(line, ' ')
      break
    }
  }

  if (!url) {
    return { ok: false, error: 'missing-url', message: 'Could not extract URL from HTTP file' }
  }

  const headers: ParsedRequest['headers'] = lines
    .filter(line => line.includes(HEADER_SEPARATOR) && !isComment(line))
    .map(line => splitOnce(line, HEADER_SEPARATOR))

  return {
    ok: true,
    request: { method, url, headers, body },
  }
}

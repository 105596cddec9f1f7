const ACCEPT = 'application/json, text/plain, */*'

export function buildApiHeaders(token: string): Record<string, string> {
  return {
    authorization: `Bearer ${token}`,
    'content-type': 'application/json',
    accept: ACCEPT,
  }
}

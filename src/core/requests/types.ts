export interface ParsedRequest {
  method: string
  url: string
  headers: Array<[name: string, value: string]>
  body: string
}

export type ArtifactParseError = 'missing-body' | 'missing-url'

export type ArtifactParseResult =
  | { ok: true, request: ParsedRequest }
  | { ok: false, error: ArtifactParseError, message: string }

/** What came back from one dispatch, shaped like the output of `curl -i`. */
export interface RawResponse {
  exitCode: number
  stdout: string
  stderr: string
}

export interface RequestDispatcher {
  dispatch(request: ParsedRequest): Promise<RawResponse>
}

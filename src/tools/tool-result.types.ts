/**
 * Tool Result Types
 *
 * Discriminated union for tool results that go beyond structured JSON.
 * Lets the MCP server return image or file content while handlers stay
 * unaware of MCP content types.
 */

/**
 * Image result - returned inline as MCP ImageContent (base64).
 * Used when image data is small enough to embed directly (<2MB).
 */
export interface ImageResult {
  readonly type: 'image';
  /** Base64-encoded image data */
  readonly data: string;
  /** MIME type (e.g., 'image/png', 'image/jpeg') */
  readonly mimeType: string;
  readonly sizeBytes: number;
}

/**
 * File result - returned as a text message with file path.
 * Used when image data is too large for inline embedding (>=2MB).
 */
export interface FileResult {
  readonly type: 'file';
  /** Absolute path to the saved file */
  readonly path: string;
  readonly mimeType: string;
  readonly sizeBytes: number;
}

export type ToolResult = ImageResult | FileResult;

/**
 * What a tool handler returns: structured JSON or a binary result.
 */
export type ToolOutput = Record<string, unknown> | ToolResult;

/** Images at or above this size are written to a temp file */
export const INLINE_IMAGE_LIMIT_BYTES = 2 * 1024 * 1024;

export function isImageResult(result: ToolOutput): result is ImageResult {
  return result.type === 'image' && 'data' in result && typeof result.data === 'string';
}

export function isFileResult(result: ToolOutput): result is FileResult {
  return result.type === 'file' && 'path' in result && typeof result.path === 'string';
}

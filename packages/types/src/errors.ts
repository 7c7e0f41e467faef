/**
 * JSON serializable Map2D error object.
 */
export interface IMap2DError extends Error {
  baseMessage: string;
  contextMessage?: string;
}

/**
 * Operation result types
 */

export type OperationResult = { ok: true } | { ok: false; reason: string };

export const OK: OperationResult = { ok: true };

export function failure(reason: string): OperationResult {
  return { ok: false, reason };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

import type { Result } from "../utils/Result";

export function expectOk<T, E>(result: Result<T, E>): T {
  if (!result.ok) {
    throw new Error(`預期為 ok，實際為 err: ${JSON.stringify(result.error)}`);
  }
  return result.value;
}

export function expectErr<T, E>(result: Result<T, E>): E {
  if (result.ok) {
    throw new Error(`預期為 err，實際為 ok: ${JSON.stringify(result.value)}`);
  }
  return result.error;
}

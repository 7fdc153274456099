import { AuthError } from '../errors'
import type { AuthErrorReason } from '../errors'

/** Runs `fn` and returns the AuthError reason it threw, or 'no-error'. */
export function authReason(fn: () => unknown): AuthErrorReason | 'no-error' | 'other-error' {
  try {
    fn()
  } catch (err) {
    return err instanceof AuthError ? err.reason : 'other-error'
  }
  return 'no-error'
}

export async function authReasonAsync(fn: () => Promise<unknown>): Promise<AuthErrorReason | 'no-error' | 'other-error'> {
  try {
    await fn()
  } catch (err) {
    return err instanceof AuthError ? err.reason : 'other-error'
  }
  return 'no-error'
}

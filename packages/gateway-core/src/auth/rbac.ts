import { AuthError } from '../errors'
import type { Role } from '../types'

const ROLE_LEVELS: Record<Role, number> = {
  viewer: 0,
  auditor: 1,
  admin: 2,
}

function isRole(role: string): role is Role {
  return Object.hasOwn(ROLE_LEVELS, role)
}

/** Unknown roles rank with viewer. */
export function roleLevel(role: string): number {
  return isRole(role) ? ROLE_LEVELS[role] : 0
}

export function authorize(identity: { role: string }, requiredRole: string): void {
  if (roleLevel(identity.role) < roleLevel(requiredRole)) {
    throw new AuthError('insufficient_permissions')
  }
}

export function canRead(_identity: { role: string }): boolean {
  return true
}

export function canWrite(identity: { role: string }): boolean {
  return roleLevel(identity.role) >= ROLE_LEVELS.auditor
}

export function canManage(identity: { role: string }): boolean {
  return roleLevel(identity.role) >= ROLE_LEVELS.admin
}

import type { AuthenticatedUser, UserRole } from '../types/user'
import { forbidden } from './errors'

export const hasRole = (user: AuthenticatedUser | null, role: UserRole): boolean => {
  if (!user) {
    return false
  }
  return user.roles.includes(role)
}

export const hasAnyRole = (user: AuthenticatedUser | null, roles: readonly UserRole[]): boolean => {
  return roles.some((role) => hasRole(user, role))
}

export const isAdmin = (user: AuthenticatedUser | null): boolean => hasRole(user, 'ADMIN')

export const canEditRecords = (user: AuthenticatedUser | null): boolean => hasAnyRole(user, ['ADMIN', 'EDITOR'])

export const canViewRecords = (user: AuthenticatedUser | null): boolean =>
  hasAnyRole(user, ['ADMIN', 'EDITOR', 'VIEWER'])

export const canViewAudit = (user: AuthenticatedUser | null): boolean => isAdmin(user)

export const ensureCanView = (user: AuthenticatedUser | null): void => {
  if (!canViewRecords(user)) {
    throw forbidden()
  }
}

export const ensureCanEdit = (user: AuthenticatedUser | null): void => {
  if (!canEditRecords(user)) {
    throw forbidden()
  }
}

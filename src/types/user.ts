export const USER_ROLES = ['ADMIN', 'EDITOR', 'VIEWER'] as const

export type UserRole = (typeof USER_ROLES)[number]

export interface AuthenticatedUser {
  id: number
  username: string
  roles: UserRole[]
}

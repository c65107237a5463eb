import { userLoggedIn, userLoggedOut, userLoginFailed } from '../events/signals'
import type { AuthenticatedUser } from '../types/user'
import { issueToken, verifyPassword } from '../utils/authentication'
import { serviceError } from '../utils/errors'
import { UserService } from './userService'

export type LoginResult = {
  token: string
  expiresAt: string
  user: AuthenticatedUser
}

export const AuthService = {
  async login(credentials: { username?: string; password?: string }, ip: string | null): Promise<LoginResult> {
    const user = credentials.username ? await UserService.findByUsername(credentials.username) : null

    if (!user || !user.active || !credentials.password || !verifyPassword(credentials.password, user.passwordHash)) {
      await userLoginFailed.send({ ip, username: credentials.username ?? null })
      throw serviceError(401, 'Invalid username or password.')
    }

    const authenticated: AuthenticatedUser = { id: user.id, username: user.username, roles: user.roles }
    const { token, expiresAt } = issueToken(authenticated)
    await userLoggedIn.send({ ip, username: user.username })

    return { token, expiresAt: expiresAt.toISOString(), user: authenticated }
  },

  async logout(user: AuthenticatedUser, ip: string | null): Promise<void> {
    await userLoggedOut.send({ ip, username: user.username })
  },
}

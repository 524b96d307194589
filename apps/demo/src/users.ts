import { z } from 'zod'
import { ConfigurationError, NotFoundError, type MessageDraft, type SiteRegistry } from '@herald/core'

export type User = {
  id: string
  firstName: string
  lastName: string
  email: string
  phoneNumber: string
  locale: string
}

export interface UserDirectory {
  get(id: string): Promise<User>
  remove(id: string): Promise<boolean>
}

export class MemoryUserDirectory implements UserDirectory {
  private readonly users = new Map<string, User>()

  async get(id: string): Promise<User> {
    const user = this.users.get(id)
    if (!user) throw new NotFoundError(`No user with id ${id}`)
    return { ...user }
  }

  save(user: User): User {
    this.users.set(user.id, { ...user })
    return user
  }

  async remove(id: string): Promise<boolean> {
    return this.users.delete(id)
  }
}

export function fullName(user: Pick<User, 'firstName' | 'lastName'>): string {
  return `${user.firstName} ${user.lastName}`
}

// Domains per site id, "default" when none is configured
export class StaticSiteRegistry implements SiteRegistry {
  constructor(private readonly domains: Record<string, string>) {}

  getDomain(siteId = 'default'): string | null {
    return this.domains[siteId] ?? null
  }
}

const UserData = z.object({ user_id: z.string().min(1) })

export function userIdOf(message: MessageDraft): string {
  const parsed = UserData.safeParse(message.data)
  if (!parsed.success) throw new ConfigurationError(`Invalid data for type "${message.type}": user_id is required`)
  return parsed.data.user_id
}

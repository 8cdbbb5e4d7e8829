export interface UserRecord {
  id: number;
  email: string;
  username: string;
  fullName: string | null;
  passwordDigest: string;
  isActive: boolean;
  isAdmin: boolean;
  createdAt: Date;
  lastLogin: Date | null;
}

/** A user as seen outside the credential store: never carries the digest. */
export type User = Omit<UserRecord, 'passwordDigest'>;

export interface NewUser {
  email: string;
  username: string;
  fullName?: string | null;
  password: string;
}

export interface UserFlags {
  isActive?: boolean;
  isAdmin?: boolean;
}

export function withoutDigest(record: UserRecord): User {
  const { passwordDigest: _digest, ...user } = record;
  return user;
}

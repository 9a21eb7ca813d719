import type { Session, User } from "@ctf-arena/types";

export interface AuthenticatedUser extends User {}

export interface AuthenticatedSession
  extends Pick<Session, "id" | "userId" | "issuedAt" | "expiresAt" | "ipAddress" | "userAgent" | "status"> {}

export interface ResolvedAuthContext {
  user: AuthenticatedUser | null;
  session: AuthenticatedSession | null;
}

import { z } from "zod";

export const userRoleSchema = z.enum(["player", "admin"]);
export type UserRole = z.infer<typeof userRoleSchema>;

export const userPermissionSchema = z.enum([
  "view_challenges",
  "submit_solutions",
  "view_own_submissions",
  "view_leaderboard",
  "manage_challenges",
  "manage_roles",
  "view_analytics",
  "view_audit_logs"
]);
export type UserPermission = z.infer<typeof userPermissionSchema>;

const playerPermissions = [
  "view_challenges",
  "submit_solutions",
  "view_own_submissions",
  "view_leaderboard"
] as const satisfies ReadonlyArray<UserPermission>;

const adminPermissions = [
  ...playerPermissions,
  "manage_challenges",
  "manage_roles",
  "view_analytics",
  "view_audit_logs"
] as const satisfies ReadonlyArray<UserPermission>;

export const rolePermissions: Record<UserRole, ReadonlyArray<UserPermission>> = {
  player: playerPermissions,
  admin: adminPermissions
};

export const userStatusSchema = z.enum(["active", "disabled"]);
export type UserStatus = z.infer<typeof userStatusSchema>;

/**
 * Identity forwarded by the session gateway. The API trusts this payload once it
 * parses; issuing and verifying the session token happens upstream.
 */
export const userSchema = z.object({
  id: z.string().min(1),
  email: z.string().email(),
  username: z.string().min(3).max(50),
  roles: z.array(userRoleSchema).min(1),
  status: userStatusSchema.default("active")
});
export type User = z.infer<typeof userSchema>;

export const sessionStatusSchema = z.enum(["active", "revoked", "expired"]);
export type SessionStatus = z.infer<typeof sessionStatusSchema>;

export const sessionSchema = z.object({
  id: z.string(),
  userId: z.string(),
  issuedAt: z.string(),
  expiresAt: z.string(),
  ipAddress: z.string().ip({ version: "v4" }).or(z.string().ip({ version: "v6" })).optional(),
  userAgent: z.string().optional(),
  status: sessionStatusSchema
});
export type Session = z.infer<typeof sessionSchema>;

export const viewerSchema = z.object({
  user: userSchema.nullable(),
  session: sessionSchema.nullable()
});
export type Viewer = z.infer<typeof viewerSchema>;

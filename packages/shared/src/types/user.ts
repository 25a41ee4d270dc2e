/** Fixed role ids seeded by the reference-data migration. */
export enum RoleId {
  USER = 1,
  GUEST = 2,
  ADMIN = 99,
}

export const DEFAULT_ROLE_ID = RoleId.GUEST;

export interface User {
  id: number;
  username: string;
  email: string;
  passwordHash: string;
  fullName: string;
  isActive: boolean;
  roleId: number;
  createdAt: Date;
  updatedAt: Date | null;
}

export interface NewUser {
  username: string;
  email: string;
  passwordHash: string;
  fullName: string;
  roleId?: number;
}

export interface Role {
  id: number;
  name: string;
  description: string | null;
  createdAt: Date;
}

export interface Permission {
  id: number;
  roleId: number;
  name: string;
  description: string | null;
  createdAt: Date;
}

export interface RoleWithPermissions extends Role {
  permissions: Permission[];
}

/** Public projection of a user; never carries the password hash. */
export interface UserResponse {
  id: number;
  fullName: string;
  username: string;
  email: string;
  roleId: number;
  isActive: boolean;
  createdAt: Date;
}

export interface UserProfile extends UserResponse {
  role: string | null;
  permissions: string[];
}

export interface RegisterRequest {
  username: string;
  fullName: string;
  email: string;
  password: string;
}

export interface LoginRequest {
  usernameOrEmail: string;
  password: string;
}

export interface AuthResponse {
  token: string;
  username: string;
  email: string;
}

import type { Knex } from 'knex';
import type { Permission, Role } from '@gatehouse/shared';

export interface RoleStore {
  listRoles(): Promise<Role[]>;
  getRole(id: number): Promise<Role | null>;
  /** Permissions of one role, or of every role when no id is given. */
  listPermissions(roleId?: number): Promise<Permission[]>;
}

interface RoleRow {
  id: number;
  name: string;
  description: string | null;
  created_at: Date | string;
}

interface PermissionRow {
  id: number;
  role_id: number;
  name: string;
  description: string | null;
  created_at: Date | string;
}

function toRole(row: RoleRow): Role {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    createdAt: new Date(row.created_at),
  };
}

function toPermission(row: PermissionRow): Permission {
  return {
    id: row.id,
    roleId: row.role_id,
    name: row.name,
    description: row.description,
    createdAt: new Date(row.created_at),
  };
}

export class MySQLRoleStore implements RoleStore {
  constructor(private db: Knex) {}

  async listRoles(): Promise<Role[]> {
    const rows = await this.db<RoleRow>('roles').select('*').orderBy('id', 'asc');
    return rows.map(toRole);
  }

  async getRole(id: number): Promise<Role | null> {
    const row = await this.db<RoleRow>('roles').where('id', id).first();
    return row ? toRole(row) : null;
  }

  async listPermissions(roleId?: number): Promise<Permission[]> {
    let query = this.db<PermissionRow>('permissions').select('*');
    if (roleId !== undefined) query = query.where('role_id', roleId);
    const rows = await query.orderBy('id', 'asc');
    return rows.map(toPermission);
  }
}

import type { Knex } from 'knex';
import { RoleId } from '@gatehouse/shared';

// Seed timestamps are fixed, UTC midnight.
const utc = (month: number, day: number): Date => new Date(Date.UTC(2025, month - 1, day));

export const SEED_ROLES = [
  { id: RoleId.USER, name: 'User', description: 'Regular user', created_at: utc(1, 2) },
  { id: RoleId.GUEST, name: 'Guest', description: 'Guest user', created_at: utc(1, 3) },
  { id: RoleId.ADMIN, name: 'Admin', description: 'Administrator', created_at: utc(1, 4) },
] as const;

export const SEED_PERMISSIONS = [
  { id: 1, role_id: RoleId.ADMIN, name: 'Manage Users', description: 'Can create, update, delete users', created_at: utc(1, 5) },
  { id: 2, role_id: RoleId.ADMIN, name: 'Manage Roles', description: 'Can create, update, delete roles', created_at: utc(1, 6) },
] as const;

export async function up(knex: Knex): Promise<void> {
  await knex('roles').insert(SEED_ROLES.map(role => ({ ...role })));
  await knex('permissions').insert(SEED_PERMISSIONS.map(permission => ({ ...permission })));
}

export async function down(knex: Knex): Promise<void> {
  await knex('permissions').whereIn('id', SEED_PERMISSIONS.map(p => p.id)).delete();
  await knex('roles').whereIn('id', SEED_ROLES.map(r => r.id)).delete();
}

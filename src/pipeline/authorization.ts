import { DbConnection } from "../db/postgres.client";
import { AuthorizationError } from "../errors";

export async function currentRole(client: DbConnection): Promise<string> {
  const res = await client.query<{ role: string }>("SELECT current_user AS role");
  const role = res.rows[0]?.role;
  if (role === undefined) throw new Error("SELECT current_user returned no row");
  return role;
}

/**
 * Refuses to run unless the destination session's role is allow-listed.
 * An empty allow-list disables the check.
 */
export async function checkRunnerRole(client: DbConnection, allowedRoles: string[]): Promise<void> {
  if (allowedRoles.length === 0) return;

  const role = await currentRole(client);
  if (!allowedRoles.includes(role)) {
    throw new AuthorizationError(
      `Database role '${role}' is not allowed to run the pipeline. Allowed: ${allowedRoles.join(", ")}.`,
      role
    );
  }
}

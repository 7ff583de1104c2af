/**
 * User persistence
 */

import { eq } from "drizzle-orm";
import { getOrm, type Orm } from "./index";
import { users } from "./schema";
import type { SteamUser } from "../model";

export function upsertUser(user: SteamUser, orm: Orm = getOrm()): void {
  const lastLogin = user.lastLogin ?? Math.floor(Date.now() / 1000);

  orm
    .insert(users)
    .values({
      steamId: user.steamId,
      personaName: user.personaName ?? null,
      profileUrl: user.profileUrl ?? null,
      avatarUrl: user.avatarUrl ?? null,
      lastLogin,
    })
    .onConflictDoUpdate({
      target: users.steamId,
      set: {
        personaName: user.personaName ?? null,
        profileUrl: user.profileUrl ?? null,
        avatarUrl: user.avatarUrl ?? null,
        lastLogin,
      },
    })
    .run();
}

export function getUser(steamId: string, orm: Orm = getOrm()): SteamUser | null {
  const row = orm.select().from(users).where(eq(users.steamId, steamId)).get();
  if (!row) {
    return null;
  }

  return {
    steamId: row.steamId,
    personaName: row.personaName ?? undefined,
    profileUrl: row.profileUrl ?? undefined,
    avatarUrl: row.avatarUrl ?? undefined,
    lastLogin: row.lastLogin ?? undefined,
  };
}

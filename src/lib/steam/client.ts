/**
 * Steam Web API client
 *
 * Read-only: player profile, owned games, achievements (player, schema,
 * global rarity). Achievement data is merged and sorted locked-first.
 */

import type {
  SteamGlobalPercentage,
  SteamGlobalPercentagesResponse,
  SteamOwnedGamesResponse,
  SteamPlayerAchievement,
  SteamPlayerAchievementsResponse,
  SteamPlayerSummariesResponse,
  SteamPlayerSummary,
  SteamSchemaAchievement,
  SteamSchemaResponse,
} from "./types";
import type { Achievement, AchievementStats, Game, GameAchievements } from "../model";
import { buildGameImages, gameIconUrl } from "./images";
import { SteamApiError, errorMessage } from "../errors";
import { createLogger } from "../logger";
import { requireSteamApiKey } from "../../config/env";

const log = createLogger("steam");

const BASE_URL = "https://api.steampowered.com";
const REQUEST_TIMEOUT_MS = 10_000;

export class SteamClient {
  constructor(
    private readonly apiKey: string,
    private readonly baseUrl: string = BASE_URL
  ) {}

  private async request<T>(endpoint: string, params: Record<string, string | number>): Promise<T> {
    const url = new URL(`${this.baseUrl}/${endpoint}`);
    url.searchParams.set("key", this.apiKey);
    for (const [name, value] of Object.entries(params)) {
      url.searchParams.set(name, String(value));
    }

    let response: Response;
    try {
      response = await fetch(url, { signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) });
    } catch (error) {
      log.error(`Request to ${endpoint} failed`, error);
      throw new SteamApiError(`Steam API request failed: ${errorMessage(error)}`);
    }

    if (!response.ok) {
      // Steam answers 401/403 for private profiles and bad keys
      const status = response.status === 401 || response.status === 403 ? 403 : 502;
      throw new SteamApiError(`Steam API ${endpoint} returned ${response.status} ${response.statusText}`, status);
    }

    return (await response.json()) as T;
  }

  async getPlayerSummaries(steamIds: string[]): Promise<SteamPlayerSummary[]> {
    const data = await this.request<SteamPlayerSummariesResponse>("ISteamUser/GetPlayerSummaries/v2/", {
      steamids: steamIds.join(","),
    });
    return data.response?.players ?? [];
  }

  async getOwnedGames(steamId: string): Promise<Game[]> {
    const data = await this.request<SteamOwnedGamesResponse>("IPlayerService/GetOwnedGames/v1/", {
      steamid: steamId,
      include_appinfo: 1,
      include_played_free_games: 1,
    });

    const games = data.response?.games;
    if (!games) {
      throw new SteamApiError("Failed to fetch games. Profile may be private.", 403);
    }

    return games
      .map((game) => ({
        appId: game.appid,
        name: game.name ?? `App ${game.appid}`,
        iconUrl: gameIconUrl(game.appid, game.img_icon_url),
        playtimeForever: game.playtime_forever ?? 0,
        playtime2Weeks: game.playtime_2weeks ?? 0,
        lastPlayed: game.rtime_last_played ?? 0,
        images: buildGameImages(game.appid),
      }))
      .sort((a, b) => b.playtimeForever - a.playtimeForever);
  }

  async getPlayerAchievements(steamId: string, appId: number): Promise<SteamPlayerAchievement[]> {
    const data = await this.request<SteamPlayerAchievementsResponse>(
      "ISteamUserStats/GetPlayerAchievements/v1/",
      { steamid: steamId, appid: appId }
    );

    const stats = data.playerstats;
    if (!stats?.success) {
      throw new SteamApiError(
        stats?.error ?? "Failed to fetch player achievements. Profile may be private or game has no achievements.",
        400
      );
    }
    return stats.achievements ?? [];
  }

  async getSchemaForGame(appId: number): Promise<{ gameName: string; achievements: SteamSchemaAchievement[] }> {
    const data = await this.request<SteamSchemaResponse>("ISteamUserStats/GetSchemaForGame/v2/", { appid: appId });
    if (!data.game) {
      throw new SteamApiError("Failed to fetch achievement schema.", 502);
    }
    return {
      gameName: data.game.gameName ?? "",
      achievements: data.game.availableGameStats?.achievements ?? [],
    };
  }

  /**
   * Global unlock percentages. A failure here only loses the rarity hint.
   */
  async getGlobalAchievementPercentages(appId: number): Promise<SteamGlobalPercentage[]> {
    try {
      const data = await this.request<SteamGlobalPercentagesResponse>(
        "ISteamUserStats/GetGlobalAchievementPercentagesForApp/v2/",
        { gameid: appId }
      );
      return data.achievementpercentages?.achievements ?? [];
    } catch (error) {
      log.warn(`Global percentages unavailable for ${appId}`, { error: errorMessage(error) });
      return [];
    }
  }

  async getAchievementsForGame(steamId: string, appId: number): Promise<GameAchievements> {
    const [player, schema, global] = await Promise.all([
      this.getPlayerAchievements(steamId, appId),
      this.getSchemaForGame(appId),
      this.getGlobalAchievementPercentages(appId),
    ]);

    const achievements = sortLockedFirst(mergeAchievementData(player, schema.achievements, global));

    return {
      appId,
      gameName: schema.gameName,
      achievements,
      stats: computeStats(achievements),
    };
  }
}

/**
 * Join player progress with schema metadata and global rarity
 */
export function mergeAchievementData(
  player: SteamPlayerAchievement[],
  schema: SteamSchemaAchievement[],
  global: SteamGlobalPercentage[]
): Achievement[] {
  if (player.length === 0 || schema.length === 0) {
    return [];
  }

  const schemaByName = new Map(schema.map((a) => [a.name, a]));
  const percentByName = new Map(global.map((g) => [g.name, Number(g.percent)]));

  return player.map((p) => {
    const meta = schemaByName.get(p.apiname);
    const percent = percentByName.get(p.apiname);

    return {
      apiName: p.apiname,
      name: p.name ?? meta?.displayName ?? p.apiname,
      description: meta?.description ?? p.description ?? "",
      achieved: p.achieved === 1,
      unlockTime: p.unlocktime ?? 0,
      icon: meta?.icon ?? "",
      iconGray: meta?.icongray ?? "",
      hidden: meta?.hidden === 1,
      globalPercent: percent !== undefined && Number.isFinite(percent) ? percent : 0,
    };
  });
}

/**
 * Locked first (rarest first), then unlocked (most recent first)
 */
export function sortLockedFirst(achievements: Achievement[]): Achievement[] {
  const locked = achievements.filter((a) => !a.achieved).sort((a, b) => a.globalPercent - b.globalPercent);
  const unlocked = achievements.filter((a) => a.achieved).sort((a, b) => b.unlockTime - a.unlockTime);
  return [...locked, ...unlocked];
}

export function computeStats(achievements: Achievement[]): AchievementStats {
  const total = achievements.length;
  const unlocked = achievements.filter((a) => a.achieved).length;
  const completion = total > 0 ? (unlocked / total) * 100 : 0;

  return {
    total,
    unlocked,
    locked: total - unlocked,
    completionPercent: Math.round(completion * 10) / 10,
  };
}

let client: SteamClient | null = null;

/**
 * Lazy-initialized client; throws if STEAM_API_KEY is missing
 */
export function getSteamClient(): SteamClient {
  if (!client) {
    client = new SteamClient(requireSteamApiKey());
  }
  return client;
}

/**
 * Steam Web API response shapes (only the fields we read)
 */

export interface SteamPlayerSummary {
  steamid: string;
  personaname?: string;
  profileurl?: string;
  avatarfull?: string;
}

export interface SteamPlayerSummariesResponse {
  response?: {
    players?: SteamPlayerSummary[];
  };
}

export interface SteamOwnedGame {
  appid: number;
  name?: string;
  img_icon_url?: string;
  playtime_forever?: number;
  playtime_2weeks?: number;
  rtime_last_played?: number;
}

export interface SteamOwnedGamesResponse {
  response?: {
    game_count?: number;
    games?: SteamOwnedGame[];
  };
}

export interface SteamPlayerAchievement {
  apiname: string;
  achieved: number;
  unlocktime?: number;
  name?: string;
  description?: string;
}

export interface SteamPlayerAchievementsResponse {
  playerstats?: {
    steamID?: string;
    gameName?: string;
    success: boolean;
    error?: string;
    achievements?: SteamPlayerAchievement[];
  };
}

export interface SteamSchemaAchievement {
  name: string;
  displayName?: string;
  description?: string;
  icon?: string;
  icongray?: string;
  hidden?: number;
}

export interface SteamSchemaResponse {
  game?: {
    gameName?: string;
    gameVersion?: string;
    availableGameStats?: {
      achievements?: SteamSchemaAchievement[];
    };
  };
}

export interface SteamGlobalPercentage {
  name: string;
  percent: number | string;
}

export interface SteamGlobalPercentagesResponse {
  achievementpercentages?: {
    achievements?: SteamGlobalPercentage[];
  };
}

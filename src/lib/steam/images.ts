/**
 * Steam CDN image URLs
 */

import type { GameImages } from "../model";

const STORE_CDN = "https://cdn.cloudflare.steamstatic.com/steam/apps";
const COMMUNITY_CDN = "https://cdn.cloudflare.steamstatic.com/steamcommunity/public/images/apps";

export function buildGameImages(appId: number): GameImages {
  return {
    header: `${STORE_CDN}/${appId}/header.jpg`,
    capsule: `${STORE_CDN}/${appId}/capsule_231x87.jpg`,
    capsuleSmall: `${STORE_CDN}/${appId}/capsule_184x69.jpg`,
    capsuleLarge: `${STORE_CDN}/${appId}/capsule_467x181.jpg`,
    hero: `${STORE_CDN}/${appId}/library_hero.jpg`,
    logo: `${STORE_CDN}/${appId}/logo.png`,
    libraryCapsule: `${STORE_CDN}/${appId}/library_600x900.jpg`,
  };
}

export function gameIconUrl(appId: number, iconHash: string | undefined): string | undefined {
  if (!iconHash) return undefined;
  return `${COMMUNITY_CDN}/${appId}/${iconHash}.jpg`;
}

import { parseNumber } from "./numbers.js";

export const RANK_ICONS = ["💎", "💥", "🚀", "✨", "📊"] as const;

export type RankIcon = (typeof RANK_ICONS)[number];

export const ICON_MULTIPLIERS = {
  "💎": 1.0,
  "💥": 0.9,
  "🚀": 0.8,
  "✨": 0.7,
  "📊": 0.6,
} as const satisfies Record<RankIcon, number>;

export function isRankIcon(value: string): value is RankIcon {
  return Object.hasOwn(ICON_MULTIPLIERS, value);
}

export type MultiplierRejectReason = "icon-not-allowed" | "sentiment-missing" | "invalid-ma-ratio";

export type MultiplierComposition =
  | {
      ok: true;
      iconMultiplier: number;
      maRatio: number;
      sentimentMultiplier: number;
      composite: number;
    }
  | { ok: false; reason: MultiplierRejectReason; message: string };

/** A positive sentiment reading, used verbatim as a multiplier; anything else opts the row out. */
export function parseSentiment(raw: string | undefined): number | undefined {
  const value = parseNumber(raw);
  if (value === undefined || value <= 0) {
    return undefined;
  }
  return value;
}

export function composeMultiplier(params: {
  icon: string;
  price: number;
  longMa: number;
  sentiment: string | undefined;
}): MultiplierComposition {
  if (!isRankIcon(params.icon)) {
    return {
      ok: false,
      reason: "icon-not-allowed",
      message: `icon '${params.icon}' not in allowed set`,
    };
  }
  const iconMultiplier = ICON_MULTIPLIERS[params.icon];
  const maRatio = params.longMa / params.price;
  if (!Number.isFinite(maRatio) || maRatio <= 0) {
    return {
      ok: false,
      reason: "invalid-ma-ratio",
      message: `long MA ${params.longMa} over price ${params.price} is not a positive ratio`,
    };
  }
  const sentimentMultiplier = parseSentiment(params.sentiment);
  if (sentimentMultiplier === undefined) {
    return {
      ok: false,
      reason: "sentiment-missing",
      message: "sentiment missing or non-positive",
    };
  }
  return {
    ok: true,
    iconMultiplier,
    maRatio,
    sentimentMultiplier,
    composite: iconMultiplier * maRatio * sentimentMultiplier,
  };
}

import type { TokenClass } from "./trading/types.js";

const MEMECOIN_KEYWORDS = [
  "meme", "dog", "cat", "pepe", "wojak", "chad", "moon", "rocket",
  "inu", "shiba", "doge", "floki", "elon", "safe", "baby", "mini",
];

const SCAM_KEYWORDS = ["scam", "fake", "test", "copy", "clone", "rug", "honeypot"];

const MEME_SUPPLY_THRESHOLD = 1_000_000_000;

export interface ClassInput {
  name: string;
  symbol: string;
  totalSupply: bigint;
  decimals: number;
}

function matches(input: ClassInput, keywords: string[]): string | null {
  const name = input.name.toLowerCase();
  const symbol = input.symbol.toLowerCase();
  return keywords.find((k) => name.includes(k) || symbol.includes(k)) ?? null;
}

/** Meme keywords or a supply above one billion whole tokens make a memecoin. */
export function classifyToken(input: ClassInput): TokenClass {
  if (matches(input, MEMECOIN_KEYWORDS)) return "memecoin";
  const wholeSupply = input.totalSupply / 10n ** BigInt(input.decimals);
  return wholeSupply > BigInt(MEME_SUPPLY_THRESHOLD) ? "memecoin" : "altcoin";
}

export function scamKeyword(input: Pick<ClassInput, "name" | "symbol">): string | null {
  return matches({ ...input, totalSupply: 0n, decimals: 0 }, SCAM_KEYWORDS);
}

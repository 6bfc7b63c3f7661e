import crypto from "crypto";

export function hashStringToSeed(seed: string): number {
  // First 8 hex chars of the SHA-256 digest become the numeric seed
  const hash = crypto.createHash("sha256").update(seed).digest("hex");
  return parseInt(hash.slice(0, 8), 16);
}

export function generateRandomSeed(): string {
  return crypto.randomBytes(32).toString("hex");
}

export function resolveSeed(seed: string | number | undefined): number {
  if (seed === undefined) {
    return hashStringToSeed(generateRandomSeed());
  }
  return typeof seed === "number" ? seed : hashStringToSeed(seed);
}

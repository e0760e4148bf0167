// src/config/env.ts

export function parsePositiveIntEnv(name: string, fallback: number, min = 1): number {
  const raw = process.env[name];
  if (raw === undefined || raw === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    throw new Error(`${name} must be an integer >= ${min}`);
  }
  return n;
}

export function parseChoiceEnv<T extends string>(
  name: string,
  choices: readonly T[],
  fallback: T
): T {
  const raw = process.env[name]?.trim();
  if (!raw) return fallback;

  const match = choices.find((c) => c === raw);
  if (!match) {
    throw new Error(`${name} must be one of: ${choices.join(", ")}`);
  }
  return match;
}

export function assertHttpUrl(name: string, url: string) {
  if (!/^https?:\/\//.test(url)) {
    throw new Error(`${name} must start with http:// or https://`);
  }
}

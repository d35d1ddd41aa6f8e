export function clampInt(value: number, min: number, max: number): number {
  const rounded = Math.round(value);
  if (Number.isNaN(rounded)) {
    return min;
  }

  return Math.max(min, Math.min(max, rounded));
}

export function formatModifier(modifier: number): string {
  return modifier >= 0 ? `+${modifier}` : `${modifier}`;
}

export function formatCredits(credits: number): string {
  return `${Math.max(0, Math.round(credits)).toLocaleString("en-US")} cr`;
}

export function deepFreeze<T>(value: T): T {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) {
    return value;
  }

  for (const child of Object.values(value)) {
    deepFreeze(child);
  }

  Object.freeze(value);
  return value;
}

// Demo settings, read from the page URL: ?instances=2000&fov=75&spin=0.05
// Anything missing or out of range falls back to the default.

export interface DemoConfig {
  /** Cubes drawn per frame, laid out on a 40-wide grid. */
  instances: number;
  /** Vertical field of view in degrees. */
  fov: number;
  /** Radians of rotation per frame. */
  spin: number;
}

export const DEFAULT_CONFIG: DemoConfig = {
  instances: 5000,
  fov: 90,
  spin: 1 / 30,
};

function readNumber(params: URLSearchParams, key: string, min: number, max: number): number | undefined {
  const raw = params.get(key);
  if (raw === null || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min || value > max) {
    console.warn(`[retained-gl] Ignoring ?${key}=${raw} (expected ${min}..${max})`);
    return undefined;
  }
  return value;
}

export function parseConfig(search: string): DemoConfig {
  const params = new URLSearchParams(search);
  const instances = readNumber(params, "instances", 1, 100_000);
  return {
    instances: instances === undefined ? DEFAULT_CONFIG.instances : Math.floor(instances),
    fov: readNumber(params, "fov", 10, 170) ?? DEFAULT_CONFIG.fov,
    spin: readNumber(params, "spin", -Math.PI, Math.PI) ?? DEFAULT_CONFIG.spin,
  };
}

import type { EffectiveConfig } from "../config/env.js";

export type LivenessProbe = () => Promise<boolean>;

const WILDCARD_HOSTS = new Set(["0.0.0.0", "::", ""]);

export function livenessUrl(host: string, port: number, healthPath: string): string {
  const target = WILDCARD_HOSTS.has(host) ? "127.0.0.1" : host.includes(":") ? `[${host}]` : host;
  return `http://${target}:${port}${healthPath}`;
}

export function livenessUrlFromConfig(config: EffectiveConfig): string {
  return livenessUrl(config.COMFYUI_HOST, config.COMFYUI_PORT, config.HEALTH_PATH);
}

/** A probe that resolves false on any failure; it never rejects. */
export function createHttpLivenessProbe(url: string, timeoutMs: number): LivenessProbe {
  return async () => {
    try {
      const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
      return response.ok;
    } catch {
      return false;
    }
  };
}

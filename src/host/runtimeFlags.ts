import type { HostCapabilities } from "./capabilities.js";

export type MemoryProfile = "high" | "medium" | "low";

export function acceleratorMemoryGB(capabilities: HostCapabilities): number | null {
  if (!capabilities.acceleratorPresent || capabilities.acceleratorMemoryMB === undefined) {
    return null;
  }
  return Math.floor(capabilities.acceleratorMemoryMB / 1024);
}

export function memoryProfile(capabilities: HostCapabilities): MemoryProfile | null {
  const gb = acceleratorMemoryGB(capabilities);
  if (gb === null) {
    return null;
  }
  if (gb >= 24) {
    return "high";
  }
  if (gb >= 12) {
    return "medium";
  }
  return "low";
}

const PROFILE_FLAGS: Record<MemoryProfile, Record<string, string>> = {
  high: {
    CUDA_MEMORY_FRACTION: "0.9",
    PYTORCH_CUDA_ALLOC_CONF: "expandable_segments:True"
  },
  medium: {
    CUDA_MEMORY_FRACTION: "0.8",
    PYTORCH_CUDA_ALLOC_CONF: "expandable_segments:True"
  },
  low: {
    CUDA_MEMORY_FRACTION: "0.7",
    PYTORCH_CUDA_ALLOC_CONF: "expandable_segments:True,max_split_size_mb:512"
  }
};

/** Environment variables for the launched service; empty without an accelerator. */
export function deriveRuntimeFlags(capabilities: HostCapabilities): Record<string, string> {
  const profile = memoryProfile(capabilities);
  return profile ? { ...PROFILE_FLAGS[profile] } : {};
}

export function memoryLaunchFlag(capabilities: HostCapabilities): string | undefined {
  const gb = acceleratorMemoryGB(capabilities);
  return gb !== null && gb < 8 ? "--lowvram" : undefined;
}

export type TorchVariant = "cu121" | "cu118" | "cpu";

export interface TorchIndex {
  variant: TorchVariant;
  url: string;
}

export function selectTorchIndex(capabilities: HostCapabilities): TorchIndex {
  const major = Number.parseInt(capabilities.toolkitVersion?.split(".")[0] ?? "", 10);
  const variant: TorchVariant = !capabilities.acceleratorPresent
    ? "cpu"
    : major === 12
      ? "cu121"
      : major === 11
        ? "cu118"
        : "cpu";
  return { variant, url: `https://download.pytorch.org/whl/${variant}` };
}

export type HttpProvider = "huggingface" | "civitai" | "generic";

interface AssetBase {
  id: string;
  destinationPath: string;
  expectedFilename: string;
  optional: boolean;
}

export interface HttpAsset extends AssetBase {
  sourceKind: "http";
  provider: HttpProvider;
  url: string;
  credential?: string;
  sha256?: string;
}

export interface ObjectStoreAsset extends AssetBase {
  sourceKind: "objectStore";
  bucket: string;
  key: string;
  sha256?: string;
}

export interface GitCredential {
  username: string;
  token: string;
}

export interface VersionControlAsset extends AssetBase {
  sourceKind: "versionControl";
  repositoryUrl: string;
  branch?: string;
  credential?: GitCredential;
}

export type AssetDescriptor = HttpAsset | ObjectStoreAsset | VersionControlAsset;

export type FetchStatus = "skipped" | "downloaded" | "failed";

export interface FetchResult {
  status: FetchStatus;
  asset: AssetDescriptor;
  path: string;
  reason?: string;
  /** Set when the run continues on an older copy, e.g. a checkout whose update failed. */
  degraded?: boolean;
}

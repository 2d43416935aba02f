import type { HttpProvider } from "./types.js";

export interface AuthorizedRequest {
  url: URL;
  headers: Record<string, string>;
}

export interface CredentialStrategy {
  attach(request: AuthorizedRequest, token: string): void;
}

const bearerHeader: CredentialStrategy = {
  attach(request, token) {
    request.headers.authorization = `Bearer ${token}`;
  }
};

const tokenQueryParameter: CredentialStrategy = {
  attach(request, token) {
    request.url.searchParams.set("token", token);
  }
};

const anonymous: CredentialStrategy = {
  attach() {}
};

export const credentialStrategies: Record<HttpProvider, CredentialStrategy> = {
  huggingface: bearerHeader,
  civitai: tokenQueryParameter,
  generic: anonymous
};

export function buildAuthorizedRequest(provider: HttpProvider, url: string, token?: string): AuthorizedRequest {
  const request: AuthorizedRequest = { url: new URL(url), headers: {} };
  if (token) {
    credentialStrategies[provider].attach(request, token);
  }
  return request;
}

/** Drops credentials from a URL before it is logged. */
export function redactUrl(url: URL): string {
  const copy = new URL(url.toString());
  if (copy.searchParams.has("token")) {
    copy.searchParams.set("token", "***");
  }
  if (copy.password) {
    copy.password = "***";
  }
  return copy.toString();
}

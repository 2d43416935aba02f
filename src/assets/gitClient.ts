import { execa } from "execa";

import type { GitCredential } from "./types.js";

export interface CloneInput {
  repositoryUrl: string;
  destination: string;
  branch?: string;
  credential?: GitCredential;
}

export interface GitClient {
  clone(input: CloneInput): Promise<void>;
  pull(checkoutPath: string, credential?: GitCredential): Promise<void>;
}

export class CliGitClient implements GitClient {
  constructor(private readonly timeoutMs = 0) {}

  async clone(input: CloneInput): Promise<void> {
    const args = [...authArgs(input.credential), "clone", "--depth", "1"];
    if (input.branch) {
      args.push("--branch", input.branch);
    }
    args.push(input.repositoryUrl, input.destination);
    await this.run(args);
  }

  async pull(checkoutPath: string, credential?: GitCredential): Promise<void> {
    await this.run([...authArgs(credential), "-C", checkoutPath, "pull", "--ff-only"]);
  }

  private async run(args: string[]): Promise<void> {
    await execa("git", args, {
      env: { ...process.env, GIT_TERMINAL_PROMPT: "0" },
      timeout: this.timeoutMs > 0 ? this.timeoutMs : undefined
    });
  }
}

// Passed per invocation so the token never lands in .git/config.
export function authArgs(credential?: GitCredential): string[] {
  if (!credential) {
    return [];
  }
  const encoded = Buffer.from(`${credential.username}:${credential.token}`).toString("base64");
  return ["-c", `http.extraHeader=Authorization: Basic ${encoded}`];
}

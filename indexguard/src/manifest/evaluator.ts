import { execFile } from "node:child_process";
import { existsSync } from "node:fs";
import path from "node:path";
import { promisify } from "node:util";
import type { EvaluatedManifest, ManifestEvaluator, ServiceResult } from "../services/types.js";
import type { ManifestConfig } from "../types/config.js";
import type { SchemaRegistry } from "../schema/registry.js";
import { normalizeVersion } from "../package/version.js";
import { MAX_CMD_BUFFER_SIZE } from "../security/limits.js";

const pExecFile = promisify(execFile);

export type ExecOptions = { cwd: string; timeout: number; maxBuffer: number };

export type ExecFn = (command: string, args: string[], opts: ExecOptions) => Promise<{ stdout: string }>;

const defaultExec: ExecFn = async (command, args, opts) => {
  const { stdout } = await pExecFile(command, args, { ...opts, encoding: "utf8" as const });
  return { stdout };
};

type ManifestFormat = { version: string };

function isSpawnFailure(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}

function failureText(e: unknown): string {
  if (typeof e === "object" && e !== null && "stderr" in e && typeof e.stderr === "string" && e.stderr.trim() !== "") {
    return e.stderr.trim();
  }
  return e instanceof Error ? e.message : String(e);
}

/**
 * Evaluates a package manifest by exporting it to JSON with an external command
 * (by default `nickel export --format json <file>`).
 *
 * Evaluation errors are returned as the tool's own diagnostics. A missing tool is
 * thrown, since then no manifest can be checked at all.
 */
export class CommandManifestEvaluator implements ManifestEvaluator {
  private readonly exec: ExecFn;

  constructor(
    private readonly config: ManifestConfig,
    private readonly registry: SchemaRegistry,
    exec?: ExecFn,
  ) {
    this.exec = exec ?? defaultExec;
  }

  async evaluate(manifestFile: string): Promise<ServiceResult<{ manifest: EvaluatedManifest }>> {
    if (!existsSync(manifestFile)) {
      return { ok: false, message: `manifest file not found: ${path.basename(manifestFile)}` };
    }

    const [command, ...args] = this.config.command;
    if (!command) {
      throw new Error("manifest.command is empty");
    }

    let stdout: string;
    try {
      ({ stdout } = await this.exec(command, [...args, manifestFile], {
        cwd: path.dirname(manifestFile),
        timeout: this.config.timeout_ms,
        maxBuffer: MAX_CMD_BUFFER_SIZE,
      }));
    } catch (e) {
      if (isSpawnFailure(e)) {
        throw new Error(`Manifest command not found: ${command}`);
      }
      return { ok: false, message: failureText(e) };
    }

    let json: unknown;
    try {
      json = JSON.parse(stdout);
    } catch (e) {
      return { ok: false, message: `manifest export is not JSON: ${e instanceof Error ? e.message : String(e)}` };
    }

    const checked = this.registry.check<ManifestFormat>("manifest", json);
    if (!checked.valid) {
      return { ok: false, message: `unexpected manifest shape: ${checked.errors}` };
    }

    const version = normalizeVersion(checked.value.version);
    if (version === null) {
      return { ok: false, message: `manifest version "${checked.value.version}" is not a valid semantic version` };
    }

    return { ok: true, manifest: { version } };
  }
}

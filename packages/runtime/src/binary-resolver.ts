import { randomUUID } from "node:crypto";
import { constants as fsConstants } from "node:fs";
import { access, chmod, copyFile, link, mkdir, rename, rm, stat } from "node:fs/promises";
import { createRequire } from "node:module";
import path from "node:path";
import type pino from "pino";
import { loadRuntimeConfig } from "./config.js";
import { ResolutionError, describeCause } from "./errors.js";
import { createChildLogger } from "./logger.js";
import {
  detectPlatform,
  driverBinaryName,
  driverPackageName,
  type PlatformInfo,
} from "./platform.js";

export const DRIVER_VERSION = "0.1.0";

export type BundledPackageLocator = (packageName: string) => string | null;

export interface ResolveDriverOptions {
  explicitPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  platform?: PlatformInfo;
  locateBundledPackage?: BundledPackageLocator;
  logger?: pino.Logger;
}

const REMEDIATION = [
  "Could not find the wheelhouse driver binary. Options:",
  "  1. Set the WHEELHOUSE_DRIVER_PATH environment variable",
  "  2. Install the platform package for your system (@wheelhouse/driver-<os>-<arch>)",
  "  3. Add wheelhouse-driver to your PATH",
  "  4. Build from source into driver/bin/",
].join("\n");

const nodeRequire = createRequire(import.meta.url);

export function locateInstalledPackage(packageName: string): string | null {
  try {
    return path.dirname(nodeRequire.resolve(`${packageName}/package.json`));
  } catch {
    return null;
  }
}

export async function isExecutableFile(filePath: string): Promise<boolean> {
  try {
    const info = await stat(filePath);
    if (!info.isFile()) {
      return false;
    }
    await access(filePath, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export function versionedCachePath(cacheDir: string, binaryName: string): string {
  return path.join(cacheDir, "driver", DRIVER_VERSION, binaryName);
}

/**
 * Search order, first match wins:
 * explicit path, env override, bundled platform package (copied to the cache),
 * PATH, cached copy, development checkouts relative to cwd.
 */
export async function resolveDriverBinary(options: ResolveDriverOptions = {}): Promise<string> {
  const logger = createChildLogger(options.logger, "binary-resolver");
  const env = options.env ?? process.env;
  const config = loadRuntimeConfig(env);
  const platform = options.platform ?? detectPlatform();
  const binaryName = driverBinaryName(platform.os);
  const searched: string[] = [];

  if (options.explicitPath) {
    const explicitPath = path.resolve(options.explicitPath);
    if (await isExecutableFile(explicitPath)) {
      logger.debug({ path: explicitPath }, "Using explicit driver path");
      return explicitPath;
    }
    throw new ResolutionError(
      `Driver binary not found or not executable at explicit path: ${options.explicitPath}`,
      { path: options.explicitPath, searched: [explicitPath] }
    );
  }

  if (config.driverPath) {
    const envPath = path.resolve(config.driverPath);
    searched.push(envPath);
    if (await isExecutableFile(envPath)) {
      logger.debug({ path: envPath }, "Using driver path from environment");
      return envPath;
    }
    logger.warn({ path: envPath }, "Driver path from environment is not an executable file");
  }

  const bundled = await extractBundledBinary({
    platform,
    binaryName,
    cacheDir: config.cacheDir,
    locate: options.locateBundledPackage ?? locateInstalledPackage,
    logger,
  });
  if (bundled) {
    logger.debug({ path: bundled }, "Using bundled driver");
    return bundled;
  }

  for (const dir of splitSearchPath(env)) {
    const candidate = path.join(dir, binaryName);
    searched.push(candidate);
    if (await isExecutableFile(candidate)) {
      logger.debug({ path: candidate }, "Using driver from PATH");
      return candidate;
    }
  }

  const cached = [
    versionedCachePath(config.cacheDir, binaryName),
    path.join(config.cacheDir, binaryName),
  ];
  for (const candidate of cached) {
    searched.push(candidate);
    if (await isExecutableFile(candidate)) {
      logger.debug({ path: candidate }, "Using cached driver");
      return candidate;
    }
  }

  const cwd = options.cwd ?? process.cwd();
  const developmentPaths = [
    path.resolve(cwd, "driver", "bin", binaryName),
    path.resolve(cwd, "..", "..", "driver", "bin", binaryName),
    path.resolve(cwd, "..", "..", "..", "driver", "bin", binaryName),
  ];
  for (const candidate of developmentPaths) {
    searched.push(candidate);
    if (await isExecutableFile(candidate)) {
      logger.debug({ path: candidate }, "Using development driver");
      return candidate;
    }
  }

  throw new ResolutionError(REMEDIATION, { searched });
}

function splitSearchPath(env: NodeJS.ProcessEnv): string[] {
  const raw = env.PATH ?? env.Path ?? "";
  return raw.split(path.delimiter).filter((entry) => entry.length > 0);
}

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && "code" in error && typeof error.code === "string"
    ? error.code
    : undefined;
}

async function publishExtracted(tmpPath: string, target: string): Promise<void> {
  try {
    await link(tmpPath, target);
  } catch (error) {
    const code = errorCode(error);
    if (code === "EPERM" || code === "ENOTSUP") {
      // Filesystems without hard links.
      await rename(tmpPath, target);
      return;
    }
    throw error;
  }
}

async function extractBundledBinary(params: {
  platform: PlatformInfo;
  binaryName: string;
  cacheDir: string;
  locate: BundledPackageLocator;
  logger: pino.Logger;
}): Promise<string | null> {
  const packageName = driverPackageName(params.platform);
  const packageDir = params.locate(packageName);
  if (!packageDir) {
    params.logger.debug({ packageName }, "No bundled driver package installed");
    return null;
  }

  const source = path.join(packageDir, "bin", params.binaryName);
  try {
    await stat(source);
  } catch {
    params.logger.debug({ packageName, source }, "Bundled driver package has no binary");
    return null;
  }

  const target = versionedCachePath(params.cacheDir, params.binaryName);
  if (await isExecutableFile(target)) {
    return target;
  }

  const tmpPath = `${target}.tmp-${process.pid}-${randomUUID()}`;
  try {
    await mkdir(path.dirname(target), { recursive: true });
    await copyFile(source, tmpPath);
    if (params.platform.os !== "win32") {
      await chmod(tmpPath, 0o755);
    }
    // link refuses an existing target; a binary that may be running is never replaced.
    await publishExtracted(tmpPath, target);
    params.logger.info({ path: target }, "Extracted bundled driver");
    return target;
  } catch (error) {
    if (await isExecutableFile(target)) {
      return target;
    }
    params.logger.warn(
      { packageName, err: describeCause(error) },
      "Failed to extract bundled driver"
    );
    return null;
  } finally {
    await rm(tmpPath, { force: true });
  }
}

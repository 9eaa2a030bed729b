import os from "node:os";
import path from "node:path";
import { UnsupportedPlatformError } from "./errors.js";

export type DriverOs = "linux" | "darwin" | "win32";
export type DriverArch = "x64" | "arm64";

export interface PlatformInfo {
  os: DriverOs;
  arch: DriverArch;
}

const DRIVER_BINARY_BASENAME = "wheelhouse-driver";
const CACHE_DIR_NAME = "wheelhouse";

export function detectPlatform(
  platform: string = process.platform,
  arch: string = process.arch
): PlatformInfo {
  return { os: normalizeOs(platform, arch), arch: normalizeArch(platform, arch) };
}

function normalizeOs(platform: string, arch: string): DriverOs {
  const value = platform.toLowerCase();
  if (value === "linux") return "linux";
  if (value === "darwin" || value.startsWith("mac")) return "darwin";
  if (value === "win32" || value.startsWith("windows")) return "win32";
  throw new UnsupportedPlatformError(platform, arch);
}

function normalizeArch(platform: string, arch: string): DriverArch {
  const value = arch.toLowerCase();
  if (value === "x64" || value === "amd64" || value === "x86_64") return "x64";
  if (value === "arm64" || value === "aarch64") return "arm64";
  throw new UnsupportedPlatformError(platform, arch);
}

export function platformIdentifier(info: PlatformInfo): string {
  return `${info.os}-${info.arch}`;
}

export function driverBinaryName(driverOs: DriverOs): string {
  return driverOs === "win32" ? `${DRIVER_BINARY_BASENAME}.exe` : DRIVER_BINARY_BASENAME;
}

export function driverPackageName(info: PlatformInfo): string {
  return `@wheelhouse/driver-${platformIdentifier(info)}`;
}

function expandHomeDir(input: string, homeDir: string): string {
  if (input.startsWith("~/")) {
    return path.join(homeDir, input.slice(2));
  }
  if (input === "~") {
    return homeDir;
  }
  return input;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value : undefined;
}

/**
 * Per-user cache root.
 * - override: WHEELHOUSE_CACHE_DIR
 * - macOS: ~/Library/Caches/wheelhouse
 * - Linux: $XDG_CACHE_HOME/wheelhouse or ~/.cache/wheelhouse
 * - Windows: %LOCALAPPDATA%\wheelhouse or ~\AppData\Local\wheelhouse
 */
export function resolveCacheRoot(
  env: NodeJS.ProcessEnv = process.env,
  driverOs: DriverOs = detectPlatform().os,
  homeDir: string = os.homedir()
): string {
  const override = nonEmpty(env.WHEELHOUSE_CACHE_DIR);
  if (override) {
    return path.resolve(expandHomeDir(override, homeDir));
  }

  switch (driverOs) {
    case "darwin":
      return path.join(homeDir, "Library", "Caches", CACHE_DIR_NAME);
    case "win32": {
      const localAppData = nonEmpty(env.LOCALAPPDATA);
      return localAppData
        ? path.join(localAppData, CACHE_DIR_NAME)
        : path.join(homeDir, "AppData", "Local", CACHE_DIR_NAME);
    }
    case "linux": {
      const xdgCache = nonEmpty(env.XDG_CACHE_HOME);
      return xdgCache
        ? path.join(xdgCache, CACHE_DIR_NAME)
        : path.join(homeDir, ".cache", CACHE_DIR_NAME);
    }
  }
}

import { existsSync, mkdirSync, readdirSync, statSync, unlinkSync } from "fs";
import { join } from "path";
import { homedir } from "os";

function getMcsshDir(): string {
  return process.env.MCSSH_HOME || join(homedir(), ".mcssh");
}

function getLogsDirPath(): string {
  return join(getMcsshDir(), "logs");
}

function getCacheDirPath(): string {
  return join(getMcsshDir(), "cache");
}

export function ensureMcsshDir(): void {
  const dir = getMcsshDir();
  const logsDir = getLogsDirPath();
  const cacheDir = getCacheDirPath();

  for (const path of [dir, logsDir, cacheDir]) {
    if (!existsSync(path)) {
      mkdirSync(path, { mode: 0o700, recursive: true });
    }
  }
}

export function getMcsshDirPath(): string {
  return getMcsshDir();
}

export function getConfigFilePath(): string {
  return join(getMcsshDir(), "config.json");
}

export function getCacheFilePath(): string {
  return join(getCacheDirPath(), "http-cache.json");
}

export function getLogsDir(): string {
  return getLogsDirPath();
}

export function rotateLogs(maxFiles: number = 10): void {
  ensureMcsshDir();

  const logsDir = getLogsDirPath();

  const files = readdirSync(logsDir)
    .filter((f) => f.endsWith(".log"))
    .map((f) => ({
      name: f,
      path: join(logsDir, f),
      mtime: statSync(join(logsDir, f)).mtime.getTime()
    }))
    .sort((a, b) => b.mtime - a.mtime);

  for (let i = maxFiles; i < files.length; i++) {
    unlinkSync(files[i].path);
  }
}

export function getCurrentLogFile(): string {
  const date = new Date().toISOString().split("T")[0];
  return join(getLogsDirPath(), `mcssh-${date}.log`);
}

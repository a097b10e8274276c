import { access, readdir, readFile, rm, truncate } from "fs/promises";
import { homedir } from "os";
import { join } from "path";
import { CommandExec } from "./clusters";
import { execCommand } from "./docker";
import { BackendError, BackendResult, failure, success, toBackendError } from "./errors";

/**
 * Host capabilities resolved once at startup. Only the WSL variant knows
 * how to reach the Windows side of Docker Desktop.
 */
export interface HostPlatform {
  readonly isWsl: boolean;
  purgeBuildCaches(): Promise<BackendResult<string[]>>;
  resetDockerDesktop(): Promise<BackendResult<void>>;
  fileExists(path: string): Promise<boolean>;
  truncateFile(path: string): Promise<BackendResult<void>>;
}

export interface PlatformOptions {
  exec?: CommandExec;
  home?: string;
  procVersionPath?: string;
}

export function detectWsl(procVersion: string): boolean {
  return /microsoft/i.test(procVersion);
}

async function readProcVersion(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch {
    return "";
  }
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/** Removes the contents of `dir`, keeping the directory. Returns false when it does not exist. */
export async function emptyDirectory(dir: string): Promise<boolean> {
  if (!(await pathExists(dir))) return false;
  const entries = await readdir(dir);
  for (const entry of entries) {
    await rm(join(dir, entry), { recursive: true, force: true });
  }
  return true;
}

export async function createHostPlatform(options: PlatformOptions = {}): Promise<HostPlatform> {
  const exec = options.exec ?? execCommand;
  const home = options.home ?? homedir();
  const isWsl = detectWsl(await readProcVersion(options.procVersionPath ?? "/proc/version"));

  let windowsProfile: Promise<string | undefined> | undefined;

  async function lookupWindowsProfile(): Promise<string | undefined> {
    try {
      const { stdout } = await exec("cmd.exe", ["/c", "echo", "%USERPROFILE%"]);
      const windowsPath = stdout.replace(/\r/g, "").trim();
      if (!windowsPath || windowsPath === "%USERPROFILE%") return undefined;
      const converted = await exec("wslpath", [windowsPath]);
      return converted.stdout.trim() || undefined;
    } catch {
      return undefined;
    }
  }

  function resolveWindowsProfile(): Promise<string | undefined> {
    if (!windowsProfile) windowsProfile = lookupWindowsProfile();
    return windowsProfile;
  }

  async function purgeAll(dirs: string[]): Promise<BackendResult<string[]>> {
    const purged: string[] = [];
    let firstError: BackendError | undefined;
    for (const dir of dirs) {
      try {
        if (await emptyDirectory(dir)) purged.push(dir);
      } catch (error) {
        if (!firstError) firstError = toBackendError(["rm", "-rf", `${dir}/*`], error);
      }
    }
    return firstError ? { ok: false, error: firstError } : success(purged);
  }

  async function runIgnoringFailure(command: string, args: string[]): Promise<void> {
    try {
      await exec(command, args);
    } catch {
      // Docker Desktop may already be stopped.
    }
  }

  return {
    isWsl,
    async purgeBuildCaches() {
      const dirs = [join(home, ".docker", "buildx")];
      if (isWsl) {
        const profile = await resolveWindowsProfile();
        if (profile && (await pathExists(join(profile, ".docker")))) {
          dirs.push(join(profile, ".docker", "buildx"), join(profile, ".docker", "desktop", "build"));
        }
      }
      return purgeAll(dirs);
    },
    async resetDockerDesktop() {
      const command = ["cmd.exe", "/c", "wsl --shutdown"];
      if (!isWsl) {
        return failure(command, new Error("Docker Desktop reset is only supported under WSL"));
      }
      const profile = await resolveWindowsProfile();
      if (!profile) {
        return failure(command, new Error("Windows user profile could not be resolved"));
      }
      await runIgnoringFailure("powershell.exe", ["-Command", "Stop-Process -Name 'Docker Desktop' -Force"]);
      const purged = await purgeAll([join(profile, "AppData", "Local", "Docker")]);
      if (!purged.ok) return purged;
      // Shutting WSL down ends this session too, so it goes last.
      await runIgnoringFailure("cmd.exe", ["/c", "wsl --shutdown"]);
      return success(undefined);
    },
    fileExists: pathExists,
    async truncateFile(path) {
      try {
        await truncate(path, 0);
        return success(undefined);
      } catch (error) {
        return failure(["truncate", "-s", "0", path], error);
      }
    }
  };
}

import { CommanderError } from "commander";
import { parseArgs } from "./args";
import { ClusterBackend, createKindBackend, createMinikubeBackend } from "./clusters";
import { createDockerBackend, DockerBackend } from "./docker";
import { UsageError } from "./errors";
import { createHostPlatform, HostPlatform } from "./platform";
import { renderReport } from "./report";
import { runCleanup } from "./run";
import {
  confirmAction,
  createLogger,
  LineWriter,
  Logger,
  setColorEnabled,
  statusInfo,
  statusSafe,
  statusWarn
} from "./ui";
import { ExecutionMode, ExitCode } from "./types";

export interface MainDependencies {
  createDocker(): DockerBackend;
  createMinikube(): ClusterBackend;
  createKind(): ClusterBackend;
  createPlatform(): Promise<HostPlatform>;
  createLog(mode: ExecutionMode): Logger;
  confirm(message: string): Promise<boolean>;
  /** Usage errors, written before any logger exists. */
  writeError: LineWriter;
  now?: () => number;
  cwd?: string;
}

const defaultDependencies: MainDependencies = {
  createDocker: () => createDockerBackend(),
  createMinikube: () => createMinikubeBackend(),
  createKind: () => createKindBackend(),
  createPlatform: () => createHostPlatform(),
  createLog: (mode) => createLogger(mode),
  confirm: confirmAction,
  writeError: (line) => console.error(line)
};

export async function main(argv: string[], overrides: Partial<MainDependencies> = {}): Promise<ExitCode> {
  const deps: MainDependencies = { ...defaultDependencies, ...overrides };

  let parsed: ReturnType<typeof parseArgs>;
  try {
    parsed = parseArgs(argv);
  } catch (error) {
    if (error instanceof CommanderError && error.exitCode === 0) return 0;
    if (error instanceof UsageError) {
      if (!error.quiet) {
        deps.writeError(statusWarn(error.message));
        deps.writeError(error.usage);
      }
      return 1;
    }
    throw error;
  }

  const { options, plan } = parsed;
  setColorEnabled(!options.noColor);
  const log = deps.createLog(plan.mode);

  const platform = await deps.createPlatform();
  if (platform.isWsl) {
    log.info(statusInfo("Detected WSL environment"));
  }

  const report = await runCleanup(
    plan,
    {
      docker: deps.createDocker(),
      minikube: deps.createMinikube(),
      kind: deps.createKind(),
      platform
    },
    { log, confirm: deps.confirm, now: deps.now, cwd: deps.cwd }
  );

  log.info(statusSafe("Cleanup completed."));
  log.info("");
  log.info("Cleanup Summary:");
  log.info(renderReport(report));

  const failed = report.totalFailed();
  if (failed > 0) {
    log.warn(`${failed} operation(s) reported failures; counts above include attempted removals.`);
  }

  if (platform.isWsl) {
    log.info(statusInfo("Please restart Docker Desktop on Windows to refresh the UI."));
    log.info(
      statusInfo("If build history persists, try running with --reset-docker-desktop (WARNING: highly destructive).")
    );
  }

  return 0;
}

import { CleanupContext, gate, recordFailure } from "./clean";
import { DockerBackend } from "./docker";
import { HostPlatform } from "./platform";
import { statusDelete, statusInfo, statusWarn } from "./ui";
import { CounterCategory, DanglingKind } from "./types";

const DANGLING_STEPS: Array<{ kind: DanglingKind; category: CounterCategory }> = [
  { kind: "images", category: "danglingImages" },
  { kind: "containers", category: "danglingContainers" },
  { kind: "volumes", category: "danglingVolumes" },
  { kind: "networks", category: "danglingNetworks" }
];

/**
 * Bulk prune of dangling resources. Counts are taken before each prune and
 * exclusions do not apply here. Resolves to false when the category was declined.
 */
export async function cleanDangling(ctx: CleanupContext, docker: DockerBackend): Promise<boolean> {
  if (!(await gate(ctx, "Proceed with cleaning dangling/unused resources?"))) return false;
  ctx.log.info(statusInfo("Cleaning dangling/unused resources..."));
  if (ctx.mode.dryRun) {
    ctx.log.info(statusInfo("[Dry-run] Would clean dangling images, containers, volumes, networks, build cache"));
  }

  const spinner = ctx.mode.dryRun ? null : ctx.log.spinner("Pruning dangling resources...");
  for (const step of DANGLING_STEPS) {
    const counted = await docker.countDangling(step.kind);
    if (counted.ok) {
      ctx.report.increment(step.category, "removed", counted.value);
    } else {
      ctx.log.detail(statusWarn(`Could not count dangling ${step.kind}: ${counted.error.message}`));
    }

    if (!ctx.mode.dryRun) {
      const pruned = await docker.pruneDangling(step.kind);
      if (!pruned.ok) recordFailure(ctx, step.category, `prune ${step.kind}`, pruned.error);
    }
  }

  if (!ctx.mode.dryRun) {
    const pruned = await docker.pruneBuildCache();
    if (!pruned.ok) recordFailure(ctx, "danglingBuildCache", "prune build cache", pruned.error);
  }
  // The builder reports no count up front; 1 means the prune was issued.
  ctx.report.increment("danglingBuildCache", "removed");
  spinner?.succeed("Dangling resources pruned");
  return true;
}

export async function cleanContainerLogs(
  ctx: CleanupContext,
  docker: DockerBackend,
  platform: HostPlatform
): Promise<void> {
  if (!(await gate(ctx, "Proceed with cleaning Docker container logs?"))) return;
  ctx.log.info(statusInfo("Cleaning Docker container logs..."));

  const ids = await docker.listContainers();
  if (!ids.ok) {
    ctx.log.detail(statusWarn(`Could not list containers: ${ids.error.message}`));
    return;
  }

  for (const id of ids.value) {
    const details = await docker.inspectContainer(id);
    if (!details.ok) continue;
    const { logPath } = details.value;
    if (!logPath || !(await platform.fileExists(logPath))) continue;

    ctx.log.detail(statusDelete(`Truncating log for container: ${id} (${logPath})`));
    if (!ctx.mode.dryRun) {
      const truncated = await platform.truncateFile(logPath);
      if (!truncated.ok) recordFailure(ctx, "logs", `truncate ${logPath}`, truncated.error);
    }
    ctx.report.increment("logs", "cleaned");
  }
}

/** Empties buildx state on both sides of WSL. Not counted in the report. */
export async function purgePlatformCaches(ctx: CleanupContext, platform: HostPlatform): Promise<void> {
  if (!platform.isWsl) return;
  if (!(await gate(ctx, "Proceed with WSL-specific cleanup?"))) return;
  ctx.log.info(statusInfo("Performing WSL-specific cleanup..."));

  if (ctx.mode.dryRun) {
    ctx.log.info(statusInfo("[Dry-run] Would clean WSL and Windows-side caches"));
    return;
  }

  const purged = await platform.purgeBuildCaches();
  if (!purged.ok) {
    ctx.log.detail(statusWarn(`Failed to purge build caches: ${purged.error.message}`));
    return;
  }
  purged.value.forEach((dir) => ctx.log.detail(statusDelete(`Emptied ${dir}`)));
}

export async function resetDockerDesktop(ctx: CleanupContext, platform: HostPlatform): Promise<void> {
  if (!(await gate(ctx, "Proceed with resetting Docker Desktop (destructive)?"))) return;
  if (!platform.isWsl) {
    ctx.log.warn("Docker Desktop reset is only supported under WSL; skipping.");
    return;
  }
  ctx.log.info(statusWarn("WARNING: Resetting Docker Desktop data (this removes ALL Docker data)..."));

  if (ctx.mode.dryRun) {
    ctx.log.info(statusInfo("[Dry-run] Would reset Docker Desktop data"));
    return;
  }

  const reset = await platform.resetDockerDesktop();
  if (!reset.ok) {
    ctx.log.warn(`Docker Desktop reset failed: ${reset.error.message}`);
    return;
  }
  ctx.log.info(statusInfo("Docker Desktop data reset. You must restart Docker Desktop manually."));
}

export async function finalSystemPrune(ctx: CleanupContext, docker: DockerBackend): Promise<void> {
  if (ctx.mode.dryRun) {
    ctx.log.info(statusInfo("[Dry-run] Would run system prune"));
    return;
  }

  const spinner = ctx.log.spinner("Running system prune...");
  const pruned = await docker.systemPrune();
  if (pruned.ok) {
    spinner?.succeed("System prune complete");
  } else {
    spinner?.fail("System prune failed");
    ctx.log.detail(statusWarn(`System prune failed: ${pruned.error.message}`));
  }
}

import {
  CleanupContext,
  containerSource,
  imageSource,
  kindSource,
  minikubeSource,
  runBuilders,
  runCategory,
  volumeSource
} from "./clean";
import { ClusterBackend } from "./clusters";
import { DockerBackend } from "./docker";
import {
  cleanContainerLogs,
  cleanDangling,
  finalSystemPrune,
  purgePlatformCaches,
  resetDockerDesktop
} from "./maintenance";
import { HostPlatform } from "./platform";
import { mergeExclusions } from "./policy";
import { RunReport } from "./report";
import { resolveProjectScope } from "./scope";
import { Logger, statusSafe } from "./ui";
import { CategoryName, CategorySelector, RunPlan } from "./types";

export interface Backends {
  docker: DockerBackend;
  minikube: ClusterBackend;
  kind: ClusterBackend;
  platform: HostPlatform;
}

export interface RunDependencies {
  log: Logger;
  confirm: (message: string) => Promise<boolean>;
  now?: () => number;
  cwd?: string;
}

export function isSelected(selector: CategorySelector, category: CategoryName): boolean {
  return selector.all || selector.only.has(category);
}

/**
 * Runs every selected category in a fixed order. Categories are independent:
 * one's outcome never changes what another selects.
 */
export async function runCleanup(plan: RunPlan, backends: Backends, deps: RunDependencies): Promise<RunReport> {
  const report = new RunReport();
  const ctx: CleanupContext = {
    mode: plan.mode,
    report,
    log: deps.log,
    confirm: deps.confirm,
    now: deps.now ?? Date.now
  };
  const { docker, platform } = backends;
  const selected = (category: CategoryName): boolean => isSelected(plan.selector, category);

  let exclusions = plan.exclusions;
  if (plan.protectCurrentDir) {
    const scope = await resolveProjectScope(docker, deps.cwd ?? process.cwd());
    exclusions = mergeExclusions(exclusions, scope);
    if (scope.containers.length > 0) {
      ctx.log.detail(
        statusSafe(`Protecting ${scope.containers.length} container(s) of compose project ${scope.project}`)
      );
    }
  }

  if (selected("containers")) {
    await runCategory(ctx, containerSource(docker), exclusions.containers, plan.olderThanDays);
  }
  if (selected("images")) {
    await runCategory(ctx, imageSource(docker), exclusions.images, plan.olderThanDays);
  }
  if (selected("volumes")) {
    await runCategory(ctx, volumeSource(docker), exclusions.volumes, plan.olderThanDays);
  }
  if (selected("builders")) {
    await runBuilders(ctx, docker, exclusions.builders);
    await purgePlatformCaches(ctx, platform);
  }
  if (plan.resetDockerDesktop) {
    await resetDockerDesktop(ctx, platform);
  }
  if (selected("minikube")) {
    await runCategory(ctx, minikubeSource(backends.minikube), exclusions.minikube);
  }
  if (selected("kind")) {
    await runCategory(ctx, kindSource(backends.kind), exclusions.kind);
  }
  const danglingCleaned = selected("dangling") && (await cleanDangling(ctx, docker));
  if (plan.cleanLogs && selected("logs")) {
    await cleanContainerLogs(ctx, docker, platform);
  }
  // The closing system prune belongs to the dangling category and shares its confirmation.
  if (danglingCleaned) {
    await finalSystemPrune(ctx, docker);
  }

  return report;
}

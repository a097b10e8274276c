import { DockerBackend } from "./docker";
import { ClusterBackend } from "./clusters";
import { BackendError, BackendResult, success } from "./errors";
import { decide, NameMatch, ResourceKey } from "./policy";
import { RunReport } from "./report";
import { Logger, statusDelete, statusInfo, statusSafe, statusWarn } from "./ui";
import { CounterCategory, ExecutionMode, ResourceDescriptor } from "./types";

export interface CleanupContext {
  mode: ExecutionMode;
  report: RunReport;
  log: Logger;
  confirm: (message: string) => Promise<boolean>;
  now: () => number;
}

export type ItemCategory = "containers" | "images" | "volumes" | "minikube" | "kind";

/** One kind of resource handled item by item: list, decide, delete. */
export interface ResourceSource {
  category: ItemCategory;
  noun: string;
  prompt: string;
  heading?: string;
  nameMatch: NameMatch;
  supportsAge: boolean;
  isAvailable?: () => Promise<boolean>;
  list(): Promise<BackendResult<ResourceDescriptor[]>>;
  remove(resource: ResourceDescriptor): Promise<BackendResult<void>>;
}

/** Confirmation is asked once per category and only with --confirm. */
export async function gate(ctx: CleanupContext, prompt: string): Promise<boolean> {
  if (!ctx.mode.confirmRequired) return true;
  return ctx.confirm(prompt);
}

export function recordFailure(
  ctx: CleanupContext,
  category: CounterCategory,
  action: string,
  error: BackendError
): void {
  ctx.report.increment(category, "failed");
  ctx.log.detail(statusWarn(`Failed to ${action}: ${error.message}`));
}

export async function runCategory(
  ctx: CleanupContext,
  source: ResourceSource,
  exclusions: ReadonlySet<string>,
  olderThanDays?: number
): Promise<void> {
  if (source.isAvailable && !(await source.isAvailable())) return;
  if (!(await gate(ctx, source.prompt))) return;
  if (source.heading) ctx.log.info(statusInfo(source.heading));

  const listed = await source.list();
  if (!listed.ok) {
    ctx.log.detail(statusWarn(`Could not list ${source.category}: ${listed.error.message}`));
    return;
  }

  const now = ctx.now();
  for (const resource of listed.value) {
    const key = ResourceKey.of(resource, source.nameMatch);
    const createdAt = source.supportsAge ? resource.createdAt : undefined;
    const decision = decide(key, exclusions, olderThanDays, createdAt, now);

    if (decision.action === "act") {
      ctx.log.detail(statusDelete(`Removing ${source.noun}: ${key.label()}`));
      if (!ctx.mode.dryRun) {
        const removed = await source.remove(resource);
        if (!removed.ok) recordFailure(ctx, source.category, `remove ${source.noun} ${resource.id}`, removed.error);
      }
      // Counts attempted removals, failed ones included.
      ctx.report.increment(source.category, "removed");
    } else {
      if (decision.reason === "excluded") {
        ctx.log.detail(statusSafe(`Excluding ${source.noun}: ${key.label()}`));
      }
      ctx.report.increment(source.category, "excluded");
    }
  }
}

export function containerSource(docker: DockerBackend): ResourceSource {
  return {
    category: "containers",
    noun: "container",
    prompt: "Proceed with cleaning containers?",
    heading: "Cleaning containers...",
    nameMatch: "exact",
    supportsAge: true,
    async list() {
      const ids = await docker.listContainers();
      if (!ids.ok) return ids;
      const resources: ResourceDescriptor[] = [];
      for (const id of ids.value) {
        const details = await docker.inspectContainer(id);
        resources.push(
          details.ok
            ? { id, displayName: details.value.name, createdAt: details.value.createdAt, kind: "container" }
            : { id, displayName: "", kind: "container" }
        );
      }
      return success(resources);
    },
    remove: (resource) => docker.removeContainer(resource.id)
  };
}

export function imageSource(docker: DockerBackend): ResourceSource {
  return {
    category: "images",
    noun: "image",
    prompt: "Proceed with cleaning images?",
    heading: "Cleaning images...",
    nameMatch: "substring",
    supportsAge: true,
    async list() {
      const ids = await docker.listImages();
      if (!ids.ok) return ids;
      const resources: ResourceDescriptor[] = [];
      for (const id of ids.value) {
        const details = await docker.inspectImage(id);
        resources.push(
          details.ok
            ? { id, displayName: details.value.repoTags.join(" "), createdAt: details.value.createdAt, kind: "image" }
            : { id, displayName: "", kind: "image" }
        );
      }
      return success(resources);
    },
    remove: (resource) => docker.removeImage(resource.id)
  };
}

export function volumeSource(docker: DockerBackend): ResourceSource {
  return {
    category: "volumes",
    noun: "volume",
    prompt: "Proceed with cleaning volumes?",
    heading: "Cleaning volumes...",
    nameMatch: "exact",
    // Older engines report no creation time for volumes.
    supportsAge: false,
    async list() {
      const names = await docker.listVolumes();
      if (!names.ok) return names;
      return success(names.value.map((name): ResourceDescriptor => ({ id: name, displayName: name, kind: "volume" })));
    },
    remove: (resource) => docker.removeVolume(resource.id)
  };
}

export function clusterSource(
  backend: ClusterBackend,
  category: "minikube" | "kind",
  noun: string,
  prompt: string
): ResourceSource {
  return {
    category,
    noun,
    prompt,
    nameMatch: "exact",
    supportsAge: false,
    isAvailable: () => backend.isInstalled(),
    async list() {
      const names = await backend.listClusters();
      if (!names.ok) return names;
      return success(
        names.value.map((name): ResourceDescriptor => ({ id: name, displayName: name, kind: "cluster-profile" }))
      );
    },
    remove: (resource) => backend.deleteCluster(resource.id)
  };
}

export function minikubeSource(backend: ClusterBackend): ResourceSource {
  return clusterSource(backend, "minikube", "minikube profile", "Proceed with cleaning minikube profiles?");
}

export function kindSource(backend: ClusterBackend): ResourceSource {
  return clusterSource(backend, "kind", "kind cluster", "Proceed with cleaning kind clusters?");
}

const DEFAULT_BUILDER = "default";

/**
 * Builders are processed in two phases: every non-excluded builder has its
 * cache pruned, and every one except the built-in default is then removed.
 */
export async function runBuilders(
  ctx: CleanupContext,
  docker: DockerBackend,
  exclusions: ReadonlySet<string>
): Promise<void> {
  if (!(await gate(ctx, "Proceed with cleaning builders and build history?"))) return;
  ctx.log.info(statusInfo("Cleaning up build history and caches..."));

  const listed = await docker.listBuilders();
  if (!listed.ok) {
    ctx.log.detail(statusWarn(`Could not list builders: ${listed.error.message}`));
    return;
  }

  for (const builder of listed.value) {
    const key = new ResourceKey(builder, builder);
    if (key.matchesAny(exclusions)) {
      ctx.log.detail(statusSafe(`Skipping excluded builder: ${builder}`));
      ctx.report.increment("builders", "excluded");
      continue;
    }

    ctx.log.detail(statusInfo(`Processing builder: ${builder}`));
    if (!ctx.mode.dryRun) {
      const used = await docker.useBuilder(builder);
      if (!used.ok) ctx.log.detail(statusWarn(`Failed to switch to builder ${builder}: ${used.error.message}`));
      const pruned = await docker.pruneBuilderCache();
      if (!pruned.ok) ctx.log.detail(statusWarn(`Failed to prune builder ${builder}: ${pruned.error.message}`));
    }
    ctx.report.increment("builders", "processed");

    if (builder !== DEFAULT_BUILDER) {
      ctx.log.detail(statusDelete(`Removing builder: ${builder}`));
      if (!ctx.mode.dryRun) {
        const removed = await docker.removeBuilder(builder);
        if (!removed.ok) recordFailure(ctx, "builders", `remove builder ${builder}`, removed.error);
      }
      ctx.report.increment("builders", "removed");
    }
  }
}

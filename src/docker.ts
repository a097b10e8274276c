import { execFile } from "child_process";
import { promisify } from "util";
import { BackendError, BackendResult, failure, success } from "./errors";
import { ContainerDetails, DanglingKind, ImageDetails } from "./types";

const execFileAsync = promisify(execFile);

export interface ExecResult {
  stdout: string;
  stderr: string;
}

export type DockerExec = (args: string[]) => Promise<ExecResult>;

const DOCKER = "docker";

export async function execCommand(command: string, args: string[]): Promise<ExecResult> {
  return execFileAsync(command, args, { maxBuffer: 10 * 1024 * 1024 });
}

export async function execDocker(args: string[]): Promise<ExecResult> {
  return execCommand(DOCKER, args);
}

/**
 * Narrow command surface over the Docker CLI. Every call reports failure
 * through its result instead of throwing.
 */
export interface DockerBackend {
  listContainers(filters?: string[]): Promise<BackendResult<string[]>>;
  inspectContainer(id: string): Promise<BackendResult<ContainerDetails>>;
  removeContainer(id: string): Promise<BackendResult<void>>;
  listImages(): Promise<BackendResult<string[]>>;
  inspectImage(id: string): Promise<BackendResult<ImageDetails>>;
  removeImage(id: string): Promise<BackendResult<void>>;
  listVolumes(): Promise<BackendResult<string[]>>;
  removeVolume(name: string): Promise<BackendResult<void>>;
  listBuilders(): Promise<BackendResult<string[]>>;
  useBuilder(name: string): Promise<BackendResult<void>>;
  pruneBuilderCache(): Promise<BackendResult<void>>;
  removeBuilder(name: string): Promise<BackendResult<void>>;
  countDangling(kind: DanglingKind): Promise<BackendResult<number>>;
  pruneDangling(kind: DanglingKind): Promise<BackendResult<void>>;
  pruneBuildCache(): Promise<BackendResult<void>>;
  systemPrune(): Promise<BackendResult<void>>;
}

export function createDockerBackend(exec: DockerExec = execDocker): DockerBackend {
  async function attempt<T>(args: string[], parse: (result: ExecResult) => T): Promise<BackendResult<T>> {
    try {
      const result = await exec(args);
      return success(parse(result));
    } catch (error) {
      return failure([DOCKER, ...args], error);
    }
  }

  const discard = (): void => undefined;

  return {
    listContainers: (filters = []) =>
      attempt(["container", "ls", "-a", "-q", ...filters.flatMap((filter) => ["--filter", filter])], ({ stdout }) =>
        parseIdLines(stdout)
      ),
    inspectContainer: (id) =>
      attempt(["container", "inspect", id], ({ stdout }) => {
        const details = parseContainerInspect(id, stdout);
        if (!details) {
          throw new BackendError([DOCKER, "container", "inspect", id], `No inspect data for container ${id}`);
        }
        return details;
      }),
    removeContainer: (id) => attempt(["container", "rm", "-f", id], discard),
    listImages: () => attempt(["image", "ls", "-a", "-q"], ({ stdout }) => uniqueIds(parseIdLines(stdout))),
    inspectImage: (id) =>
      attempt(["image", "inspect", id], ({ stdout }) => {
        const details = parseImageInspect(id, stdout);
        if (!details) {
          throw new BackendError([DOCKER, "image", "inspect", id], `No inspect data for image ${id}`);
        }
        return details;
      }),
    removeImage: (id) => attempt(["image", "rm", "-f", id], discard),
    listVolumes: () => attempt(["volume", "ls", "-q"], ({ stdout }) => parseIdLines(stdout)),
    removeVolume: (name) => attempt(["volume", "rm", "-f", name], discard),
    listBuilders: () => attempt(["buildx", "ls"], ({ stdout }) => parseBuilderList(stdout)),
    useBuilder: (name) => attempt(["buildx", "use", name], discard),
    pruneBuilderCache: () => attempt(["buildx", "prune", "-a", "-f"], discard),
    removeBuilder: (name) => attempt(["buildx", "rm", name], discard),
    countDangling: (kind) =>
      attempt(buildDanglingListArgs(kind), ({ stdout }) => countOutputLines(stdout, kind === "images")),
    pruneDangling: (kind) => attempt(buildPruneArgs(kind), discard),
    pruneBuildCache: () => attempt(["builder", "prune", "-a", "-f"], discard),
    systemPrune: () => attempt(["system", "prune", "-a", "-f", "--volumes"], discard)
  };
}

export function parseIdLines(output: string): string[] {
  return output
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
}

export function uniqueIds(ids: string[]): string[] {
  return [...new Set(ids)];
}

export function countOutputLines(output: string, unique = false): number {
  const ids = parseIdLines(output);
  return unique ? uniqueIds(ids).length : ids.length;
}

export function buildDanglingListArgs(kind: DanglingKind): string[] {
  switch (kind) {
    case "images":
      return ["image", "ls", "-q", "-f", "dangling=true"];
    case "containers":
      return ["container", "ls", "-a", "-q", "-f", "status=exited"];
    case "volumes":
      return ["volume", "ls", "-q", "-f", "dangling=true"];
    case "networks":
      return ["network", "ls", "-q", "-f", "dangling=true"];
  }
}

export function buildPruneArgs(kind: DanglingKind): string[] {
  switch (kind) {
    case "images":
      return ["image", "prune", "-f", "-a"];
    case "containers":
      return ["container", "prune", "-f", "--filter", "status=exited"];
    case "volumes":
      return ["volume", "prune", "-f"];
    case "networks":
      return ["network", "prune", "-f"];
  }
}

/**
 * Builder names from `docker buildx ls`. Node rows are indented (or drawn
 * with `\_` on newer releases) and the current builder carries a `*`.
 */
export function parseBuilderList(output: string): string[] {
  const names = output
    .split("\n")
    .filter((line) => line.trim() !== "" && !/^\s/.test(line) && !line.startsWith("\\_"))
    .map((line) => line.split(/\s+/)[0].replace(/\*$/, ""))
    .filter((name) => name !== "" && name !== "NAME/NODE");
  return uniqueIds(names);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === "string" && value !== "" ? value : undefined;
}

function firstInspectEntry(output: string): Record<string, unknown> | undefined {
  const parsed: unknown = JSON.parse(output);
  const entry: unknown = Array.isArray(parsed) ? parsed[0] : parsed;
  return isRecord(entry) ? entry : undefined;
}

export function parseContainerInspect(id: string, output: string): ContainerDetails | undefined {
  const entry = firstInspectEntry(output);
  if (!entry) return undefined;

  const mounts = Array.isArray(entry.Mounts) ? entry.Mounts : [];
  const volumeMounts = mounts
    .filter(isRecord)
    .filter((mount) => mount.Type === "volume")
    .map((mount) => readString(mount, "Name"))
    .filter((name): name is string => name !== undefined);

  return {
    id,
    name: (readString(entry, "Name") ?? "").replace(/^\//, ""),
    createdAt: readString(entry, "Created"),
    imageRef: readString(entry, "Image"),
    volumeMounts,
    logPath: readString(entry, "LogPath")
  };
}

export function parseImageInspect(id: string, output: string): ImageDetails | undefined {
  const entry = firstInspectEntry(output);
  if (!entry) return undefined;

  const tags = Array.isArray(entry.RepoTags) ? entry.RepoTags : [];
  return {
    id,
    repoTags: tags.filter((tag): tag is string => typeof tag === "string"),
    createdAt: readString(entry, "Created")
  };
}

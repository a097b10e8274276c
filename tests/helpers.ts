import { vi } from "vitest";
import { CleanupContext } from "../src/clean";
import { ClusterBackend, CommandExec } from "../src/clusters";
import { DockerBackend, ExecResult } from "../src/docker";
import { BackendError, BackendResult, success } from "../src/errors";
import { HostPlatform } from "../src/platform";
import { RunReport } from "../src/report";
import { createLogger, Logger, Spinner } from "../src/ui";
import { ContainerDetails, DanglingKind, ExecutionMode, ImageDetails } from "../src/types";

export const DAY = 24 * 60 * 60 * 1000;
export const NOW = Date.parse("2026-03-01T12:00:00.000Z");

export function daysAgo(days: number): string {
  return new Date(NOW - days * DAY).toISOString();
}

/**
 * Mock helper to set up docker command responses
 * Allows setting specific responses for different docker commands
 */
export function mockDockerExec() {
  const responses: Record<string, string> = {};
  const failures = new Set<string>();
  const callLog: string[][] = [];

  const execDockerMock = vi.fn(async (args: string[]): Promise<ExecResult> => {
    callLog.push([...args]);
    const key = args.join(" ");

    if (failures.has(key)) {
      throw new Error(`Command failed: docker ${key}`);
    }
    if (key in responses) {
      return { stdout: responses[key], stderr: "" };
    }

    throw new Error(`Unmocked docker command: ${key}`);
  });

  return {
    execDockerMock,
    setResponse: (args: string[], output: string) => {
      responses[args.join(" ")] = output;
    },
    setFailure: (args: string[]) => {
      failures.add(args.join(" "));
    },
    getCallLog: () => callLog
  };
}

/** Same idea for non-docker tools: keys are `command arg1 arg2`. */
export function mockCommandExec() {
  const responses: Record<string, string> = {};
  const callLog: string[] = [];

  const exec: CommandExec = vi.fn(async (command: string, args: string[]): Promise<ExecResult> => {
    const key = [command, ...args].join(" ");
    callLog.push(key);
    if (key in responses) {
      return { stdout: responses[key], stderr: "" };
    }
    throw new Error(`Command not found: ${command}`);
  });

  return {
    exec,
    setResponse: (key: string, output: string) => {
      responses[key] = output;
    },
    getCallLog: () => callLog
  };
}

export interface FakeContainer extends ContainerDetails {
  exited?: boolean;
  labels?: Record<string, string>;
}

export interface FakeImage extends ImageDetails {
  dangling?: boolean;
}

function fail<T>(command: string): BackendResult<T> {
  return { ok: false, error: new BackendError(command.split(" "), `${command} failed`) };
}

/** In-memory Docker engine. Removals mutate the snapshot so a second run sees the result. */
export class FakeDocker implements DockerBackend {
  containers = new Map<string, FakeContainer>();
  images = new Map<string, FakeImage>();
  volumes = new Set<string>();
  danglingVolumes = new Set<string>();
  networks = new Set<string>();
  builders: string[] = [];
  calls: string[] = [];
  failingCommands = new Set<string>();
  danglingCounts: Partial<Record<DanglingKind, BackendResult<number>>> = {};

  addContainer(container: Partial<FakeContainer> & { id: string }): this {
    this.containers.set(container.id, { name: "", volumeMounts: [], ...container });
    return this;
  }

  addImage(image: Partial<FakeImage> & { id: string }): this {
    this.images.set(image.id, { repoTags: [], ...image });
    return this;
  }

  private call<T>(command: string, value: T): BackendResult<T> {
    this.calls.push(command);
    return this.failingCommands.has(command) ? fail(command) : success(value);
  }

  /** Commands that change state, in order. */
  mutations(): string[] {
    return this.calls.filter((call) => !/^(container ls|container inspect|image ls|image inspect|volume ls|buildx ls|count )/.test(call));
  }

  async listContainers(filters: string[] = []): Promise<BackendResult<string[]>> {
    const ids = [...this.containers.values()]
      .filter((container) =>
        filters.every((filter) => {
          const match = /^label=([^=]+)=(.*)$/.exec(filter);
          return match ? container.labels?.[match[1]] === match[2] : true;
        })
      )
      .map((container) => container.id);
    return this.call(["container ls", ...filters].join(" "), ids);
  }

  async inspectContainer(id: string): Promise<BackendResult<ContainerDetails>> {
    const container = this.containers.get(id);
    if (!container) return fail(`container inspect ${id}`);
    return this.call(`container inspect ${id}`, container);
  }

  async removeContainer(id: string): Promise<BackendResult<void>> {
    const result = this.call(`container rm ${id}`, undefined);
    if (result.ok) this.containers.delete(id);
    return result;
  }

  async listImages(): Promise<BackendResult<string[]>> {
    return this.call("image ls", [...this.images.keys()]);
  }

  async inspectImage(id: string): Promise<BackendResult<ImageDetails>> {
    const image = this.images.get(id);
    if (!image) return fail(`image inspect ${id}`);
    return this.call(`image inspect ${id}`, image);
  }

  async removeImage(id: string): Promise<BackendResult<void>> {
    const result = this.call(`image rm ${id}`, undefined);
    if (result.ok) this.images.delete(id);
    return result;
  }

  async listVolumes(): Promise<BackendResult<string[]>> {
    return this.call("volume ls", [...this.volumes]);
  }

  async removeVolume(name: string): Promise<BackendResult<void>> {
    const result = this.call(`volume rm ${name}`, undefined);
    if (result.ok) this.volumes.delete(name);
    return result;
  }

  async listBuilders(): Promise<BackendResult<string[]>> {
    return this.call("buildx ls", [...this.builders]);
  }

  async useBuilder(name: string): Promise<BackendResult<void>> {
    return this.call(`buildx use ${name}`, undefined);
  }

  async pruneBuilderCache(): Promise<BackendResult<void>> {
    return this.call("buildx prune", undefined);
  }

  async removeBuilder(name: string): Promise<BackendResult<void>> {
    const result = this.call(`buildx rm ${name}`, undefined);
    if (result.ok) this.builders = this.builders.filter((builder) => builder !== name);
    return result;
  }

  async countDangling(kind: DanglingKind): Promise<BackendResult<number>> {
    this.calls.push(`count ${kind}`);
    const preset = this.danglingCounts[kind];
    if (preset) return preset;
    switch (kind) {
      case "images":
        return success([...this.images.values()].filter((image) => image.dangling).length);
      case "containers":
        return success([...this.containers.values()].filter((container) => container.exited).length);
      case "volumes":
        return success(this.danglingVolumes.size);
      case "networks":
        return success(this.networks.size);
    }
  }

  async pruneDangling(kind: DanglingKind): Promise<BackendResult<void>> {
    return this.call(`prune ${kind}`, undefined);
  }

  async pruneBuildCache(): Promise<BackendResult<void>> {
    return this.call("builder prune", undefined);
  }

  async systemPrune(): Promise<BackendResult<void>> {
    return this.call("system prune", undefined);
  }
}

export class FakeCluster implements ClusterBackend {
  calls: string[] = [];

  constructor(
    readonly tool: string,
    public clusters: string[] = [],
    public installed = true
  ) {}

  async isInstalled(): Promise<boolean> {
    return this.installed;
  }

  async listClusters(): Promise<BackendResult<string[]>> {
    this.calls.push("list");
    return success([...this.clusters]);
  }

  async deleteCluster(name: string): Promise<BackendResult<void>> {
    this.calls.push(`delete ${name}`);
    this.clusters = this.clusters.filter((cluster) => cluster !== name);
    return success(undefined);
  }
}

export class FakePlatform implements HostPlatform {
  files = new Map<string, string>();
  calls: string[] = [];

  constructor(public isWsl = false) {}

  async purgeBuildCaches(): Promise<BackendResult<string[]>> {
    this.calls.push("purge");
    return success(["/home/dev/.docker/buildx"]);
  }

  async resetDockerDesktop(): Promise<BackendResult<void>> {
    this.calls.push("reset");
    return success(undefined);
  }

  async fileExists(path: string): Promise<boolean> {
    return this.files.has(path);
  }

  async truncateFile(path: string): Promise<BackendResult<void>> {
    this.calls.push(`truncate ${path}`);
    this.files.set(path, "");
    return success(undefined);
  }
}

export const REAL_RUN: ExecutionMode = { dryRun: false, verbose: false, quiet: false, confirmRequired: false };

export function captureLogger(mode: Partial<ExecutionMode> = {}): { log: Logger; lines: string[]; spinners: string[] } {
  const lines: string[] = [];
  const spinners: string[] = [];
  const spinner = (text: string): Spinner => {
    spinners.push(text);
    return {
      succeed: (done) => spinners.push(`succeed: ${done ?? text}`),
      fail: (failed) => spinners.push(`fail: ${failed ?? text}`)
    };
  };
  const push = (line: string) => {
    lines.push(line);
  };
  const log = createLogger({ ...REAL_RUN, ...mode }, push, spinner, push);
  return { log, lines, spinners };
}

export function createTestContext(
  mode: Partial<ExecutionMode> = {},
  answers: boolean[] = []
): CleanupContext & { lines: string[]; prompts: string[] } {
  const { log, lines } = captureLogger(mode);
  const prompts: string[] = [];
  return {
    mode: { ...REAL_RUN, ...mode },
    report: new RunReport(),
    log,
    lines,
    prompts,
    confirm: async (message) => {
      prompts.push(message);
      return answers.shift() ?? false;
    },
    now: () => NOW
  };
}

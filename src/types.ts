export type ResourceKind = "container" | "image" | "volume" | "builder" | "cluster-profile" | "network";

export type CategoryName =
  | "containers"
  | "images"
  | "volumes"
  | "builders"
  | "minikube"
  | "kind"
  | "dangling"
  | "logs";

export type ExclusionKind = "containers" | "images" | "volumes" | "builders" | "minikube" | "kind";

export type CounterCategory =
  | "containers"
  | "images"
  | "volumes"
  | "builders"
  | "minikube"
  | "kind"
  | "danglingImages"
  | "danglingContainers"
  | "danglingVolumes"
  | "danglingNetworks"
  | "danglingBuildCache"
  | "logs";

export type CounterMetric = "removed" | "excluded" | "processed" | "cleaned" | "failed";

export type DanglingKind = "images" | "containers" | "volumes" | "networks";

export type ExitCode = 0 | 1;

export interface CliOptions {
  excludeContainers: string[];
  excludeImages: string[];
  excludeVolumes: string[];
  excludeBuilders: string[];
  excludeMinikube: string[];
  excludeKind: string[];
  protectCurrentDir: boolean;
  resetDockerDesktop: boolean;
  dryRun: boolean;
  verbose: boolean;
  olderThan?: number;
  onlyContainers: boolean;
  onlyImages: boolean;
  onlyVolumes: boolean;
  onlyBuilders: boolean;
  onlyMinikube: boolean;
  onlyKind: boolean;
  onlyDangling: boolean;
  onlyLogs: boolean;
  confirm: boolean;
  cleanLogs: boolean;
  quiet: boolean;
  noColor: boolean;
}

export interface ExecutionMode {
  dryRun: boolean;
  verbose: boolean;
  quiet: boolean;
  confirmRequired: boolean;
}

export type CategorySelector = { all: true } | { all: false; only: ReadonlySet<CategoryName> };

export type Exclusions = Record<ExclusionKind, ReadonlySet<string>>;

export interface ResourceDescriptor {
  id: string;
  displayName: string;
  createdAt?: string;
  kind: ResourceKind;
}

export interface ContainerDetails {
  id: string;
  name: string;
  createdAt?: string;
  imageRef?: string;
  volumeMounts: string[];
  logPath?: string;
}

export interface ImageDetails {
  id: string;
  repoTags: string[];
  createdAt?: string;
}

export interface RunPlan {
  mode: ExecutionMode;
  selector: CategorySelector;
  exclusions: Exclusions;
  olderThanDays?: number;
  protectCurrentDir: boolean;
  resetDockerDesktop: boolean;
  cleanLogs: boolean;
}

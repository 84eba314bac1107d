// =============================================================================
// Capabilities available to service definitions
// =============================================================================

/**
 * Console printer used by every command
 */
export interface Output {
  header(title: string): void;
  success(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  info(message: string): void;
  line(message?: string): void;
}

export interface ExecOptions {
  /** Allocate a TTY and attach stdin (`kubectl exec -it`) */
  tty?: boolean;
  /** Stream this local file into the process stdin */
  stdinPath?: string;
  /** Write process stdout to this local file */
  stdoutPath?: string;
}

export interface RunPodOptions {
  env?: Record<string, string>;
}

export interface LogOptions {
  lines: number;
  follow: boolean;
}

export type WorkloadKind = 'deployment' | 'statefulset';

/**
 * kubectl operations, always scoped to a namespace unless noted
 */
export interface KubeClient {
  resourceExists(kind: string, name: string, namespace?: string): Promise<boolean>;
  /** Run `kubectl get ...` and return stdout, or null when the command fails */
  get(args: string[], namespace?: string): Promise<string | null>;
  jsonPath(kind: string, name: string, path: string, namespace: string): Promise<string | null>;
  podStatus(selector: string, namespace: string): Promise<string | null>;
  firstPod(selector: string, namespace: string): Promise<string | null>;
  latestPod(selector: string, namespace: string): Promise<string | null>;
  podExists(name: string, namespace: string): Promise<boolean>;
  nodePort(service: string, namespace: string, portName: string): Promise<string | null>;
  exec(pod: string, namespace: string, command: string[], options?: ExecOptions): Promise<void>;
  copyTo(localPath: string, namespace: string, pod: string, remotePath: string): Promise<void>;
  logs(pod: string, namespace: string, options: LogOptions): Promise<void>;
  showLogs(selector: string, namespace: string, options: LogOptions): Promise<void>;
  rolloutRestart(kind: WorkloadKind, name: string, namespace: string): Promise<void>;
  deleteByLabel(kind: string, selector: string, namespace: string): Promise<boolean>;
  runPod(
    name: string,
    namespace: string,
    image: string,
    command: string[],
    options?: RunPodOptions
  ): Promise<boolean>;
  /** Interactive `kubectl run` for one-off jobs */
  runInteractive(args: string[]): Promise<void>;
  waitForPhase(
    kind: string,
    name: string,
    namespace: string,
    phase: string,
    attempts: number,
    intervalMs: number
  ): Promise<boolean>;
}

/**
 * Minikube operations needed by service definitions
 */
export interface ClusterClient {
  ip(): Promise<string | null>;
  openService(service: string, namespace: string): Promise<void>;
  mount(hostPath: string): number | undefined;
  activeMounts(): Promise<string[]>;
}

export interface HttpRequest {
  method: 'GET' | 'POST' | 'PUT' | 'DELETE';
  url: string;
  body?: unknown;
  auth?: { username: string; password: string };
}

export interface HttpResponse {
  status: number;
  ok: boolean;
  /** Parsed JSON when the response is JSON, raw text otherwise */
  body: unknown;
}

export interface HttpClient {
  request(request: HttpRequest): Promise<HttpResponse>;
}

export interface Prompter {
  confirm(message: string, defaultValue?: boolean): Promise<boolean>;
}

/**
 * Everything a service definition may touch while running
 */
export interface ServiceContext {
  namespace: string;
  /** Host path shared with the cluster (Spark project mount) */
  projectPath: string;
  kube: KubeClient;
  cluster: ClusterClient;
  http: HttpClient;
  prompt: Prompter;
  out: Output;
  openUrl(url: string): Promise<boolean>;
  sleep(ms: number): Promise<void>;
}

// =============================================================================
// Service definitions
// =============================================================================

export interface Workload {
  kind: WorkloadKind;
  name: string;
  /** Human-readable label used in messages, defaults to the service name */
  label?: string;
  /** Pod selector whose logs are shown when the workload fails to become ready */
  selector: string;
  timeoutSeconds: number;
  /** StatefulSets only */
  replicas?: number;
  /** Printed before waiting */
  waitMessage?: string;
  /** Skip waiting for this workload (e.g. an embedded dependency that is already provided) */
  skip?: (ctx: ServiceContext) => Promise<boolean>;
  /** Set to false to leave the workload alone on restart */
  restartable?: boolean;
}

export interface StatusSection {
  title: string;
  /** `kubectl get` arguments; namespace is appended unless clusterScoped */
  get?: string[];
  /** Pod selector rendered with `get pods -o wide` */
  pods?: string;
  clusterScoped?: boolean;
  /** Pods shown instead when the `get` command fails */
  fallbackPods?: string;
  /** Printed when the command fails */
  fallback?: string;
}

export interface AccessPort {
  key: string;
  service: string;
  portName: string;
}

export interface AccessContext {
  ip: string | null;
  ports: Record<string, string | null>;
  namespace: string;
}

export interface HealthProbe {
  image: string;
  command(namespace: string): string[];
  env?: Record<string, string>;
}

export interface LogTarget {
  name: string;
  aliases?: string[];
  selector: string;
  /** Used when no pod matches `selector` */
  fallbackSelector?: string;
}

export interface ActionArgument {
  name: string;
  required?: boolean;
  variadic?: boolean;
  description?: string;
}

/**
 * A service-specific subcommand. Actions either run directly or group
 * nested subactions (`topic create`, `index list`).
 */
export interface ServiceAction {
  name: string;
  aliases?: string[];
  description: string;
  arguments?: ActionArgument[];
  /** Forward unknown options to the wrapped CLI untouched */
  passThrough?: boolean;
  subactions?: ServiceAction[];
  /** Resolving false marks the command as failed after it has reported why */
  run?: (ctx: ServiceContext, args: string[]) => Promise<boolean | void>;
}

export interface ServiceHooks {
  afterApply?: (ctx: ServiceContext) => Promise<void>;
  afterRemove?: (ctx: ServiceContext) => Promise<void>;
  afterStatus?: (ctx: ServiceContext) => Promise<void>;
  /** Replaces the generic status report */
  status?: (ctx: ServiceContext) => Promise<void>;
  /** Replaces the generic log viewer; receives the raw positional arguments */
  logs?: (ctx: ServiceContext, args: string[], follow: boolean) => Promise<boolean | void>;
}

export interface ServiceDefinition {
  id: string;
  name: string;
  description: string;
  aliases: string[];
  /** File name under the manifests directory */
  manifest: string;
  /** Primary pod selector */
  selector: string;
  /** Resource whose existence means the service is deployed */
  presence: { kind: string; name: string };
  workloads: Workload[];
  statusSections: StatusSection[];
  accessPorts: AccessPort[];
  describeAccess?: (access: AccessContext) => string[];
  healthCheck?: HealthProbe;
  logTargets?: { defaultTarget: string; targets: LogTarget[] };
  renderManifest?: (content: string, ctx: ServiceContext) => string;
  hooks: ServiceHooks;
  actions: ServiceAction[];
  notes: string[];
  examples: string[];
}

export type DefineServiceInput = Omit<
  ServiceDefinition,
  'aliases' | 'statusSections' | 'accessPorts' | 'hooks' | 'actions' | 'notes' | 'examples'
> &
  Partial<
    Pick<
      ServiceDefinition,
      'aliases' | 'statusSections' | 'accessPorts' | 'hooks' | 'actions' | 'notes' | 'examples'
    >
  >;

// Types
export type {
  Output,
  ExecOptions,
  RunPodOptions,
  LogOptions,
  WorkloadKind,
  KubeClient,
  ClusterClient,
  HttpRequest,
  HttpResponse,
  HttpClient,
  Prompter,
  ServiceContext,
  Workload,
  StatusSection,
  AccessPort,
  AccessContext,
  HealthProbe,
  LogTarget,
  ActionArgument,
  ServiceAction,
  ServiceHooks,
  ServiceDefinition,
  DefineServiceInput,
} from './types';

// Define helpers
export { defineService, defineAction } from './define';

// Registry
export { ServiceRegistry } from './registry';

export {
  containerPaths,
  type DiscoveryOptions,
  DOCKER_VOLUMES_ROOT,
  groupWorkloads,
  hasAutoRestartPolicy,
  resolveHostPath,
  WorkloadDiscovery,
} from "./workload-discovery";

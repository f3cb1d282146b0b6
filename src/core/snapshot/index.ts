export {
  copyPreserving,
  type PathCopier,
  SnapshotController,
  type SnapshotHooks,
  type SnapshotOptions,
} from "./snapshot-controller";

export { SyncManager, type SyncOptions, type UploadConfirmation } from "./sync-manager";

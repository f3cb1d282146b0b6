export { type ArchiveContext, ArchivePipeline, createTarGzip } from "./archive-pipeline";
export {
  decryptFile,
  deriveKey,
  ENCRYPTION_MAGIC,
  encryptFile,
  IV_LENGTH,
  KDF_ITERATIONS,
  SALT_LENGTH,
  TAG_LENGTH,
} from "./encryption";
export { type LocateDeps, type LocatedArchive, locateArchive } from "./locate";
export { restoreArchive, type VerifyResult, verifyArchive } from "./restore";

export {
  computeFingerprint,
  scanTree,
  EMPTY_FINGERPRINT,
  type Fingerprint,
  type FingerprintOptions,
  type ScanStats,
} from "./fingerprint";

export {
  runBuild,
  toShellCommand,
  type BuildOptions,
  type BuildResult,
  type BuildRunner,
} from "./builder";

export {
  RebuildGate,
  FAILURE_PREFIX,
  type FreshnessResult,
  type GateState,
  type RebuildGateOptions,
} from "./gate";

export { agentsContentKind, createAgentMaterializer, loadAgentCatalog } from "./lib/agents/materializer.js";
export { compileAgent } from "./lib/agents/compiler.js";
export { parseAgentDefinition } from "./lib/agents/parser.js";
export { PLATFORM_PROFILES, resolveAgentTargetRoot } from "./lib/agents/platforms.js";
export type { AgentDefinition, CompiledAgent, Platform } from "./lib/agents/types.js";
export { defineConfig } from "./lib/config/config-types.js";
export type { UnitsyncConfig } from "./lib/config/config-types.js";
export { createFetchHttpClient } from "./lib/content/http.js";
export type { HttpClient } from "./lib/content/http.js";
export { parseManifest, serializeManifest } from "./lib/content/manifest.js";
export type { Manifest, ManifestEntry } from "./lib/content/manifest.js";
export { createRemoteMaterializer } from "./lib/content/materializer.js";
export { reconcileManifest } from "./lib/content/reconcile.js";
export { checkContent, installContent, updateContent } from "./lib/content/sync.js";
export { discoverUnits } from "./lib/discovery.js";
export type { DiscoveredUnit, UnitPredicate } from "./lib/discovery.js";
export {
	IntegrityError,
	IoError,
	NetworkError,
	NotFoundError,
	SyncError,
	ValidationError,
} from "./lib/errors.js";
export { fingerprint, fingerprintFile } from "./lib/fingerprint.js";
export { createLogger, silentLogger } from "./lib/logger.js";
export type { Logger } from "./lib/logger.js";
export { applyDiff } from "./lib/reconcile/apply.js";
export { countDiff, hasChanges } from "./lib/reconcile/diff.js";
export { reconcile } from "./lib/reconcile/engine.js";
export { formatDiff, formatSyncReport } from "./lib/reconcile/summary.js";
export type {
	ContentKind,
	Diff,
	FileDiff,
	Materializer,
	Status,
	SyncPolicy,
	SyncReport,
	UnitDiff,
} from "./lib/reconcile/types.js";
export { createSkillMaterializer, skillsContentKind } from "./lib/skills/materializer.js";
export { collectFiles, nodeContentStore } from "./lib/store.js";
export type { ContentStore } from "./lib/store.js";

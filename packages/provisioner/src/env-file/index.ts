export { EnvFileStoreImpl } from "./env-file-store.js";
export {
	appendLines,
	hasRustLog,
	isMiningKeyMissing,
	parseEnvFile,
	upsertAssignment,
	withLoggingDefaults,
} from "./env-file.js";

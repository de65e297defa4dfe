export {
	createDataStreamAdmin,
	isExpired,
	TEMPLATE_PRIORITY,
	templateBody,
	templateName,
} from "./data-stream-admin.js";
export type {
	BackingIndex,
	CleanOptions,
	CleanResult,
	CreateResult,
	DataStreamAdmin,
	DataStreamAdminOptions,
	RolloverResult,
} from "./types.js";

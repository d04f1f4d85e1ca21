import type { UserErrorMessage } from "./types";

export const ReadErrors = {
	PATH_NOT_FOUND: ["Path does not exist"],
	PERMISSION_DENIED: ["Permission denied"],
	IS_DIRECTORY: ["Expected a file but found a directory"],
	INVALID_ENCODING: ["Invalid UTF-8 encoding"],
	TOO_LARGE: ["File exceeds the configured size limit"],
	UNEXPECTED_ERROR: ["Unexpected error accessing"],
} as const satisfies Record<string, UserErrorMessage>;

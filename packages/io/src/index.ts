export { SourceReader, type InputStream } from "./source-reader/reader";
export {
	STDIN_SOURCE,
	type ReadConfig,
	type SourceText,
	type SourceContents,
	type ReadError,
} from "./source-reader/types";

export interface SerializeOptions {
	/** Line terminator, `"\n"` unless given */
	eol?: string;
}

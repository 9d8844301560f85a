export interface SerializeOptions {
	indent?: number;
}

/**
 * Interface for file format adapters
 */
export interface FileFormatAdapter {
	/**
	 * File extensions supported by this adapter (including dot, e.g. ".json")
	 */
	extensions: string[];

	/**
	 * Parse file content into a mapping
	 * @throws when the content is malformed or its root is not a mapping
	 */
	parse(content: string): Promise<Record<string, unknown>>;

	serialize(data: Record<string, unknown>, options?: SerializeOptions): Promise<string>;
}

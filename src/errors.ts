/** Content is not well-formed XML */
export class MalformedInputError extends Error {
	readonly code: string;
	readonly line: number;
	readonly col: number;

	constructor(source: string, detail: { code: string; msg: string; line: number; col: number }) {
		super(`Malformed XML in ${source} (line ${detail.line}, column ${detail.col}): ${detail.msg}`, { cause: detail });
		this.name = "MalformedInputError";
		this.code = detail.code;
		this.line = detail.line;
		this.col = detail.col;
	}
}

/** Well-formed XML that does not look like a save file */
export class StructureError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "StructureError";
	}
}

export class NotFoundError extends Error {
	readonly path: string;

	constructor(path: string, message = `File not found: ${path}`) {
		super(message);
		this.name = "NotFoundError";
		this.path = path;
	}
}

/** Bad invocation: wrong arguments or an unusable output location */
export class ConfigError extends Error {
	readonly path?: string;

	constructor(message: string, path?: string) {
		super(message);
		this.name = "ConfigError";
		if (path !== undefined) this.path = path;
	}
}

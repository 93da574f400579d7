import path from "node:path";

export function ensureWithinBase(baseDir: string, childPath: string, label: string): string {
	const base = path.resolve(baseDir);
	const resolved = path.resolve(base, childPath);
	const rel = path.relative(base, resolved);
	if (rel.startsWith("..") || path.isAbsolute(rel)) {
		throw new Error(`Invalid ${label}: path escapes base directory`);
	}
	return resolved;
}

export function sanitizePathSegment(value: string, fallback: string, maxLength = 64): string {
	const normalized = value
		.trim()
		.replace(/[\\/]+/g, "-")
		.replace(/[^a-zA-Z0-9._-]+/g, "-")
		.replace(/^-+|-+$/g, "")
		.slice(0, maxLength);
	return normalized.length > 0 ? normalized : fallback;
}

export function toPosixRelative(baseDir: string, target: string): string {
	return path.relative(baseDir, target).split(path.sep).join("/");
}

/**
 * Compiles an artifact path pattern into a matcher over workspace-relative
 * POSIX paths. `**` spans directories, `*` and `?` stay within one segment.
 */
export function compilePathPattern(pattern: string): (relativePath: string) => boolean {
	const normalized = pattern.trim().replace(/\\/g, "/").replace(/^\.\//, "");
	let source = "";
	for (let i = 0; i < normalized.length; i += 1) {
		const char = normalized[i];
		if (char === "*" && normalized[i + 1] === "*") {
			if (normalized[i + 2] === "/") {
				source += "(?:.*/)?";
				i += 2;
			} else {
				source += ".*";
				i += 1;
			}
			continue;
		}
		if (char === "*") {
			source += "[^/]*";
			continue;
		}
		if (char === "?") {
			source += "[^/]";
			continue;
		}
		source += char.replace(/[.+^${}()|[\]\\]/g, "\\$&");
	}
	// A bare directory pattern matches everything below it.
	const regex = new RegExp(`^${source}(?:/.*)?$`);
	return (relativePath) => regex.test(relativePath);
}

export const MASK = "****";

/**
 * Tracks secret values that must never reach persisted output. Values are
 * reference counted so overlapping credential scopes can share one value.
 */
export class SecretMasker {
	private readonly values = new Map<string, number>();

	add(secret: string): void {
		for (const piece of secretPieces(secret)) {
			this.values.set(piece, (this.values.get(piece) ?? 0) + 1);
		}
	}

	remove(secret: string): void {
		for (const piece of secretPieces(secret)) {
			const count = (this.values.get(piece) ?? 0) - 1;
			if (count > 0) {
				this.values.set(piece, count);
			} else {
				this.values.delete(piece);
			}
		}
	}

	get size(): number {
		return this.values.size;
	}

	mask(text: string): string {
		if (this.values.size === 0 || text.length === 0) {
			return text;
		}
		const ordered = Array.from(this.values.keys()).sort((a, b) => b.length - a.length);
		let masked = text;
		for (const value of ordered) {
			masked = masked.split(value).join(MASK);
		}
		return masked;
	}
}

// Multi-line secrets are masked line by line so that line-buffered output
// never carries any fragment of them.
function secretPieces(secret: string): string[] {
	const lines = secret
		.split(/\r?\n/)
		.map((line) => line.trim())
		.filter((line) => line.length > 0);
	return lines.length > 0 ? Array.from(new Set(lines)) : [];
}

export type MaskingWriter = {
	write: (chunk: string) => void;
	flush: () => void;
};

/**
 * Buffers output until a full line is available, masks it and hands it on.
 * Masking whole lines keeps a secret split across two chunks from slipping
 * through.
 */
export function createMaskingWriter(
	masker: SecretMasker,
	emit: (text: string) => void,
): MaskingWriter {
	let buffer = "";

	return {
		write(chunk: string) {
			buffer += chunk;
			const newline = buffer.lastIndexOf("\n");
			if (newline === -1) {
				return;
			}
			const complete = buffer.slice(0, newline + 1);
			buffer = buffer.slice(newline + 1);
			emit(maskLines(masker, complete));
		},
		flush() {
			if (buffer.length === 0) {
				return;
			}
			const remaining = buffer;
			buffer = "";
			emit(maskLines(masker, remaining));
		},
	};
}

function maskLines(masker: SecretMasker, text: string): string {
	return text
		.split("\n")
		.map((line) => masker.mask(line))
		.join("\n");
}

const PLACEHOLDER = /\$\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

export function templateNames(template: string): string[] {
	return Array.from(template.matchAll(PLACEHOLDER), (match) => match[1]);
}

// Unknown names are left in place; the resolver rejects them before a run starts.
export function renderTemplate(template: string, values: Readonly<Record<string, string>>): string {
	return template.replace(PLACEHOLDER, (placeholder: string, name: string) => values[name] ?? placeholder);
}

/**
 * Diagnostic severity levels.
 */
export const DiagnosticSeverity = {
	Error: 0,
	Note: 2,
	Warning: 1,
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

const SEVERITY_LABELS: Record<DiagnosticSeverity, string> = {
	[DiagnosticSeverity.Error]: 'error',
	[DiagnosticSeverity.Warning]: 'warning',
	[DiagnosticSeverity.Note]: 'note',
}

/** Lowercase label used in rendered diagnostics (`error`, `warning`, `note`). */
export function severityLabel(severity: DiagnosticSeverity): string {
	return SEVERITY_LABELS[severity]
}

/**
 * Diagnostic definition in the catalog.
 * `message`, `description` and `suggestion` may hold `{name}` placeholders.
 */
export interface DiagnosticDef {
	readonly code: string
	readonly severity: DiagnosticSeverity
	readonly message: string
	readonly description: string
	readonly suggestion?: string
}

/**
 * Template arguments for diagnostic messages.
 */
export type DiagnosticArgs = Record<string, string | number>

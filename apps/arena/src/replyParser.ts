import {
	type BoardState,
	COLUMN_LETTERS,
	columnIndex,
	height,
	ROWS,
} from "@connect-arena/engine";
import { z } from "zod";

// A missing or empty move_column reads as this, which names no column.
export const MISSING_COLUMN = "missing";

export type MoveRejectionReason =
	| "agent_error"
	| "malformed_reply"
	| "invalid_shape"
	| "unknown_column"
	| "column_full";

export type Rationale = {
	evaluation: string;
	threats: string;
	opportunities: string;
	strategy: string;
};

export type ParsedReply =
	| { ok: true; moveColumn: string; rationale: Rationale }
	| { ok: false; reason: MoveRejectionReason; error: string };

export type ResolvedColumn =
	| { ok: true; column: number }
	| { ok: false; reason: MoveRejectionReason; error: string };

// Rationale is display-only, so odd values are blanked instead of rejected.
const rationaleText = z.string().nullish().catch(null);

export const AgentReplySchema = z
	.object({
		evaluation: rationaleText,
		threats: rationaleText,
		opportunities: rationaleText,
		strategy: rationaleText,
		move_column: z.string().nullish(),
	})
	.passthrough();

export type AgentReply = z.infer<typeof AgentReplySchema>;

/** Keep the text from the first `{` to the last `}` when both exist. */
export function extractJsonObject(raw: string): string {
	const left = raw.indexOf("{");
	const right = raw.lastIndexOf("}");
	if (left === -1 || right === -1) return raw;
	return raw.slice(left, right + 1);
}

export function parseAgentReply(raw: string): ParsedReply {
	let text = extractJsonObject(raw);
	// Bare "{X}" is shorthand for {"move_column": "X"}.
	if (text.length === 3 && text.startsWith("{") && text.endsWith("}")) {
		text = JSON.stringify({ move_column: text[1] });
	}

	let decoded: unknown;
	try {
		decoded = JSON.parse(text);
	} catch (error) {
		return {
			ok: false,
			reason: "malformed_reply",
			error: error instanceof Error ? error.message : String(error),
		};
	}

	const result = AgentReplySchema.safeParse(decoded);
	if (!result.success) {
		const errors = result.error.errors
			.map((e) => `${e.path.join(".") || "reply"}: ${e.message}`)
			.join("; ");
		return { ok: false, reason: "invalid_shape", error: errors };
	}

	const reply = result.data;
	return {
		ok: true,
		moveColumn: (reply.move_column || MISSING_COLUMN).toUpperCase(),
		rationale: {
			evaluation: reply.evaluation ?? "",
			threats: reply.threats ?? "",
			opportunities: reply.opportunities ?? "",
			strategy: reply.strategy ?? "",
		},
	};
}

/** A move is playable when it names a known column that still has room. */
export function resolveColumn(
	state: BoardState,
	moveColumn: string,
): ResolvedColumn {
	const column = columnIndex(moveColumn);
	if (column === null) {
		return {
			ok: false,
			reason: "unknown_column",
			error: `Unknown column "${moveColumn}"; expected one of ${COLUMN_LETTERS.join(", ")}.`,
		};
	}
	if (height(state, column) >= ROWS) {
		return {
			ok: false,
			reason: "column_full",
			error: `Column ${moveColumn} is full.`,
		};
	}
	return { ok: true, column };
}

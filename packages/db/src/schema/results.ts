import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

// Append-only; the autoincrement id is the replay order.
export const results = sqliteTable("results", {
	id: integer("id").primaryKey({ autoIncrement: true }),
	redAgent: text("red_agent").notNull(),
	yellowAgent: text("yellow_agent").notNull(),
	redWon: integer("red_won", { mode: "boolean" }).notNull(),
	yellowWon: integer("yellow_won", { mode: "boolean" }).notNull(),
	playedAt: text("played_at").notNull(),
});

export type ResultRow = typeof results.$inferSelect;

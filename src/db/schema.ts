export * from "./schema/tournaments.js";
export * from "./schema/teams.js";
export * from "./schema/matches.js";

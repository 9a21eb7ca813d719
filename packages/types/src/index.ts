export * from "./analytics";
export * from "./auth";
export * from "./challenges";
export * from "./leaderboard";
export * from "./submissions";

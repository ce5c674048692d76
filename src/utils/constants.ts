export const glyphs = {
  wall: "█",
  start: "A",
  goal: "B",
  path: "*",
  open: " ",
} as const;

export const map_color_constants = {
  emptyColor: "#f8fafc",
  wallColor: "#0f172a",
  visitedColor: "#fde68a", // amber-200
  frontierColor: "#bfdbfe", // blue-200
  currentColor: "#ef4444",
  finalPathColor: "#86efac", // green-300
  startGoalColor: "#22c55e",
  endGoalColor: "#8b5cf6",
  gridLineColor: "#e2e8f0",
} as const;

export const DEFAULT_MAZE = [
  "##    #",
  "## ## #",
  "#B #  #",
  "# ## ##",
  "     ##",
  "A######",
].join("\n");

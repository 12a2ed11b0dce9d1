// Weather tool barrel export
export { runQueryTool } from "./run-query.js";
export { listStationsTool } from "./list-stations.js";
export { summarizeTool } from "./summarize.js";
export { trendTool } from "./trend.js";

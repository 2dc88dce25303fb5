export { BaseQualityPlugin } from "./base-plugin.js";
export { ReportStorePlugin } from "./report-store-plugin.js";

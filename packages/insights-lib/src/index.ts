export * from "./errors";
export * from "./utils/logger";
export * from "./config/configFile";
export * from "./export/csv";

export * from "./orders/types";
export * from "./orders/valueParsers";
export * from "./orders/vipLoader";
export * from "./orders/flatten";
export * from "./orders/schema";
export * from "./orders/extractor";
export * from "./orders/runner";

export * from "./chatLogs/types";
export * from "./chatLogs/stats";
export * from "./chatLogs/preprocess";
export * from "./chatLogs/analysis";
export * from "./chatLogs/costModel";
export * from "./chatLogs/report";
export * from "./chatLogs/runner";

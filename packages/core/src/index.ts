export * from "./lib/types";

export * from "./lib/errors";
export * from "./lib/logger";
export * from "./lib/config";

export * from "./lib/bytes";
export * from "./lib/rlp";

export * from "./lib/proof";
export * from "./lib/entities";

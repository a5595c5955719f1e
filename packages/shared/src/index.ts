export * from "./types";
export * from "./platform";
export * from "./account/index";

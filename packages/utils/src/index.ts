export * from "./constants.js";
export * from "./emails.js";
export * from "./errors.js";

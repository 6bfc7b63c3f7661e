/**
 * Pipeline module - driver and collaborator contracts
 */
export * from "./types.js";
export * from "./driver.js";

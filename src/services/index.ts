/**
 * Services module - re-export all service modules
 */

export * from "./notifier";
export * from "./booking-executor";
export * from "./supply-finder";
export * from "./passive-monitor";

export * from "./captcha";
export * from "./human";
export * from "./identities";
export * from "./launcher";
export * from "./optimization";
export * from "./popups";
export * from "./search-route";
export * from "./session";
export * from "./stealth";
export * from "./warmup";

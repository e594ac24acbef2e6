export * from "./layout";
export * from "./kernel";
export * from "./graph";
export * from "./backend/register";

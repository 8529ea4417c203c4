export * from "./HonoAdapter";

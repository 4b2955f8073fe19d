export * from "./ConfigStore";
export * from "./ConfigStoreJson";

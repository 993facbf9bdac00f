export * from "./location-text";
export * from "./gazetteer";
export * from "./geocoder";
export * from "./resolver";

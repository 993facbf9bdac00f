export * from "./http-fetcher";
export * from "./discovery";

export * from "./capabilities";
export * from "./config";
export * from "./db";
export * from "./errors";
export * from "./functions";
export * from "./logger";
export * from "./runtime";
export * from "./schema";
export * from "./services";
export * from "./sessionCoordinator";
export * from "./sessionStore";
export * from "./tagCatalog";
export * from "./traitDirectory";
export * as taggedVariables from "./taggedVariables";
export * as dccReviews from "./dccReviews";
export * as studyResponses from "./studyResponses";
export * as dccDecisions from "./dccDecisions";
export * as reviewStatus from "./reviewStatus";
export * from "./reviewSessions";
export * from "./decisionSessions";

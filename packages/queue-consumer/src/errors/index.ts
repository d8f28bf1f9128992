export * from "./submission-errors";
export * from "./error-classifier.service";

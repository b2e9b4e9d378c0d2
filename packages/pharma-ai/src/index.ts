export * from "./drugNameValidator.js";
export * from "./entityRecognizer.js";
export * from "./lexicon.js";
export * from "./targetIndicationExtractor.js";

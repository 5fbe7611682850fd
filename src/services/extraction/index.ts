export { TextExtractionService, isPDF, decodeText, joinPages } from "./text.extraction";
export { assertWithinUploadLimit, readDocumentBytes } from "./upload.extraction";
export type * from "./types";

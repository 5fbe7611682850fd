export { DocumentProcessingService, documentIdFor } from "./document.processing";
export type * from "./types";

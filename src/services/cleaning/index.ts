export { QueryCleaningService, FILLER_PHRASES } from "./query.cleaning";

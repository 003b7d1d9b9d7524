/**
 * Extractor Base Barrel Export
 */

export type { IMemoryExtractor, PageState } from "./IMemoryExtractor";
export { SourceStrategy } from "@/core/domain/MemoryRecord";
export type { MemoryRecord } from "@/core/domain/MemoryRecord";

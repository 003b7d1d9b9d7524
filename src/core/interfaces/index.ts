/**
 * Core Interfaces Barrel Export
 */

export type {
  ActionResult,
  CapturedResponse,
  IElementHandle,
  IPageDriver,
  JsonValue,
  ResponseListener,
} from "./IPageDriver";
export type { ISessionProvider } from "./ISessionProvider";
export type { IExportSerializer, SerializedExport } from "./IExportSerializer";
export type { ICheckpointStore } from "./ICheckpointStore";
export { ExportError, ExportErrorType } from "./ExportErrorType";

export { renderPdf, savePdf, alignedX, ChecklistRenderError, PDF_CREATOR } from './pdf-renderer.js';
export type { RenderOptions, ChecklistRenderErrorCode } from './pdf-renderer.js';

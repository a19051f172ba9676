/**
 * Template parsing and rendering
 *
 * @module core/templating
 */

export type * from './ast.js';
export { isPlainText } from './ast.js';
export { parseTemplate } from './parser.js';
export {
  TemplateRenderer,
  DEFAULT_MACRO_DEPTH_LIMIT,
  type RenderResult,
  type TemplateRendererOptions,
} from './renderer.js';

/**
 * Renderer Services Index
 */

export {
  PolicyRenderer,
  render,
  contentHash,
  resolveLayout,
  descriptorContentHash,
  artifactFileName,
  fieldMask,
  maskLiteral,
  formatValue,
} from './policy-renderer';
export type { LayoutRegister, LayoutField, RenderOptions } from './policy-renderer';
export { compileTemplate, renderTemplate, toSnake, toPascal, toCppType, FILTERS } from './template';
export type { CompiledTemplate, Segment, Filter, TemplateValue, TemplateVariables } from './template';
export { getTemplate, templateNames } from './templates';
export type { TemplateName } from './templates';

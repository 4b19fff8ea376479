/**
 * Answer-file rendering for the unattended installer
 */
export type { AnswerFileTemplate, AnswerSection, AnswerValue, RenderOptions } from './types.js';
export { ProxmoxAnswerTemplate, renderAnswerFile, escapeTomlString } from './AnswerFileRenderer.js';

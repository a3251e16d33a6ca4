export {
  DialogueGenerator,
  DEFAULT_DIALOGUE_OPTIONS,
  buildChoices,
  citationsFor,
  formatCitationLine,
  maskAnswer,
} from './dialogue-generator';
export type {
  Citation,
  ComposedReply,
  DialogueGeneratorOptions,
  ReplyRequest,
} from './dialogue-generator';
export { NO_MATERIAL_REPLY } from './templates';
export type {
  ContextExcerpt,
  FixedReplyId,
  TemplateId,
  UtteranceGenerator,
  UtteranceInputs,
} from './templates';

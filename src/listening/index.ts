export {
  ListeningEngine,
  NEWEST_SENTENCE_BONUS,
  RECALL_FAMILY,
  GENERIC_FAMILY,
  LAST_RESORT_FAMILY,
  ruleFamily,
  domainFamily,
  emotionFamily,
  type ResponseStage,
  type ListeningReply,
  type EngineState,
  type ListeningEngineOptions,
} from './engine.js';
export { VariantController, type VariantControllerOptions, type VariantControllerState, type VariantPick } from './variant-controller.js';
export {
  loadListeningRules,
  compileListeningRules,
  countCaptureGroups,
  listeningRulesFileSchema,
  LISTENING_RULES_FILE,
  type ListeningRule,
  type TemplateVariant,
} from './rules.js';
export { loadListeningPools, compileListeningPools, LISTENING_POOLS_FILE, type ListeningPools } from './pools.js';
export { toSecondPerson, sanitizePossessiveEcho } from './pronouns.js';
export { evaluateResponses, type ResponseDiagnostics } from './diagnostics.js';

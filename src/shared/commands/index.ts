export {
  CommandKindRegistry,
  defineCommandKind,
  type CommandKindDefinition,
  type CommandKindHandler,
  type HandlerOutcome,
  type KindContext,
  type PreconditionCode,
  type PreconditionFailure,
  type PrepareOutcome,
  type PreparedCommand,
} from './CommandKindRegistry';
export { BUILTIN_KIND_HANDLERS, createDefaultRegistry } from './builtinKinds';

export {
  createDecryptionCallbackHandler,
  parseCallbackBody,
  statusForError,
} from './http';
export type {
  IncomingRequest,
  OutgoingResponse,
  DecryptionResolver,
  DecryptionCallbackHandlerOptions,
  CallbackHandler,
} from './http';

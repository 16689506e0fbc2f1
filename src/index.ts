// Public entry point. Importing it also registers the built-in group error
// tables.

import "./groups/index.ts";

export {
  type CborValue,
  decodePayload,
  encodePayload,
  payloadFromObject,
  type SmpPayload,
} from "./cbor.ts";
export {
  checkResponse,
  createTableResolver,
  type GroupErrorResolver,
  getRegisteredGroups,
  registerGroupErrors,
  resolveGroupReturnCode,
  resolveReturnCode,
  unregisterGroupErrors,
} from "./errorRegistry.ts";
export {
  DuplicateSequenceError,
  GroupReturnCodeError,
  ManagerClosedError,
  MTU_RANGE,
  MtuOutOfRangeError,
  MtuUnchangedError,
  ReturnCodeError,
  SmpError,
  SmpFrameError,
  type SmpFrameErrorCode,
  SmpTimeoutError,
  TransportClosedError,
  UnknownSequenceError,
} from "./errors.ts";
export {
  buildPacket,
  encodeHeader,
  framingForScheme,
  HEADER_KEY,
  HEADER_SIZE,
  type PacketRequest,
  type SmpFraming,
} from "./frameBuilder.ts";
export {
  parseFrame,
  parseHeader,
  parseResponse,
  readReturnCodes,
  type SmpFrame,
} from "./frameParser.ts";
export {
  GROUP_IDS,
  GROUP_LABELS,
  groupFromValue,
  groupLabel,
  groupToValue,
  type NamedGroupKind,
  namedGroup,
  type SmpGroup,
} from "./groups.ts";
export * from "./groups/index.ts";
export {
  defaultMtu,
  type SmpCallback,
  SmpManager,
  type SmpManagerOptions,
  type SmpResult,
} from "./manager.ts";
export { ReorderBuffer } from "./reorderBuffer.ts";
export {
  describeReturnCode,
  isSupported,
  RETURN_CODES,
  type ReturnCodeKind,
  returnCodeKind,
  USER_DEFINED_ERROR_BASE,
} from "./returnCodes.ts";
export { SequenceNumberAllocator } from "./sequence.ts";
export {
  type GroupReturnCode,
  isResponseOperation,
  type SequenceNumber,
  type SmpHeader,
  SmpOperation,
  type SmpRequest,
  type SmpRequestOperation,
  type SmpResponse,
  type SmpScheme,
  SmpVersion,
} from "./smp.ts";
export type { SmpCompletion, SmpTransport } from "./transport/transport.ts";

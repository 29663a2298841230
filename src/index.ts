// src/index.ts

export { Address, hexIdToDec, devIdToHex, pktAddrs } from './address.js';
export { Frame, toVerb } from './frame.js';
export * from './command.js';
export { FaultLog } from './fault-log.js';
export { PAYLOAD_PARSERS, decodePayload, parse, parsePayload, type ParseMeta } from './parsers.js';
export { PayloadValidator, DEFAULT_CONFIG } from './validator.js';
export * from './decoders.js';
export * from './utils/helpers.js';
export * from './errors.js';
export { decodeFrame as decodeOpenthermFrame } from './opentherm/opentherm.js';
export { CODES, VERBS, PRIORITY, QOS_TX_DEFAULT } from './constants/constants.js';
export { codecLogger } from './logger.js';
export type * from './types/ramses-types.js';

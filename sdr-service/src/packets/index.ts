export * from './types.js';
export { parseLine, parsePacket, parseTimestamp, shapeSignature, listFamilies, type FamilyInfo } from './parser.js';
export { PacketAssembler } from './assembler.js';

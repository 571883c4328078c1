export type {
  DatagramGeneratorConfig,
  GeneratedInvalidDatagram,
  GeneratedValidDatagram,
  InvalidDatagramKind,
  RandomSource,
  ValidDatagramOptions,
} from './testing/index.js';
export { DatagramGenerator, seededRandom } from './testing/index.js';

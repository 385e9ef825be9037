import chalk, { Chalk, type ChalkInstance } from 'chalk';

const plain = new Chalk({ level: 0 });

/**
 * Colour styles for terminal output, or no-op styles when colour is off
 */
export function createPalette(color: boolean): ChalkInstance {
  return color ? chalk : plain;
}

/**
 * Arithmetic primitives used by the program: the add collaborator and the
 * operand parse.
 */

export { add } from './add.js';
export { parseOperand } from './parseOperand.js';

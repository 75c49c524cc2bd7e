export * from './encoding.js';
export * from './random.js';
export * from './hash.js';
export * from './signer.js';
export * from './token-codec.js';
export * from './password-hasher.js';

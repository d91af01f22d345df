export {
  SIGNATURE_HEADER,
  computeSignature,
  verifySignature,
} from './signature-verifier';

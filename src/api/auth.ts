import type { FastifyReply, FastifyRequest } from 'fastify';
import { ErrorCode, toErrorEnvelope } from '../errors/taxonomy.js';
import { isReservedKey } from '../utils/records.js';

export const CALLER_HEADER = 'x-caller-address';

/**
 * Reads the calling account from the request. Identity is asserted, not
 * proven: signature checks are outside this service.
 */
export const resolveCaller = (request: FastifyRequest, reply: FastifyReply): string | null => {
  const raw = request.headers[CALLER_HEADER];
  const caller = (Array.isArray(raw) ? raw[0] : raw)?.trim();

  if (!caller) {
    void reply.code(401).send(toErrorEnvelope(
      ErrorCode.Unauthorized,
      `Missing ${CALLER_HEADER} header.`,
    ));
    return null;
  }

  if (isReservedKey(caller)) {
    void reply.code(401).send(toErrorEnvelope(
      ErrorCode.Unauthorized,
      `Reserved ${CALLER_HEADER} value.`,
    ));
    return null;
  }

  return caller;
};

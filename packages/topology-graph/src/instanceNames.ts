import { ParseError } from './errors';

export type ParsedInstanceName = {
  container: number;
  component: string;
  taskId: number;
};

const INSTANCE_PREFIX = 'container';
const INSTANCE_SEPARATOR = '_';
const BROKER_SEPARATOR = '-';
const DIGITS = /^\d+$/;

function parseIndex(token: string, segment: string, label: string): number {
  if (!DIGITS.test(segment)) {
    throw new ParseError(token, `${label} segment "${segment}" is not a non-negative integer`);
  }
  return Number.parseInt(segment, 10);
}

/**
 * Decodes `container_<container>_<component>_<taskId>`. The component
 * segment may itself contain underscores.
 */
export function parseInstanceName(token: string): ParsedInstanceName {
  const parts = token.split(INSTANCE_SEPARATOR);
  if (parts.length < 4) {
    throw new ParseError(token, `expected ${INSTANCE_PREFIX}_<container>_<component>_<task>`);
  }
  if (parts[0] !== INSTANCE_PREFIX) {
    throw new ParseError(token, `expected prefix "${INSTANCE_PREFIX}"`);
  }

  const container = parseIndex(token, parts[1], 'container');
  const taskId = parseIndex(token, parts[parts.length - 1], 'task');
  const component = parts.slice(2, -1).join(INSTANCE_SEPARATOR);
  if (component.length === 0) {
    throw new ParseError(token, 'component segment is empty');
  }

  return { container, component, taskId };
}

/** `stmgr-3` -> 3: the integer after the first separator of a broker id. */
export function parseBrokerContainer(brokerId: string): number {
  const separatorIndex = brokerId.indexOf(BROKER_SEPARATOR);
  if (separatorIndex < 0) {
    throw new ParseError(brokerId, `missing "${BROKER_SEPARATOR}" separator`);
  }
  return parseIndex(brokerId, brokerId.slice(separatorIndex + 1), 'container');
}

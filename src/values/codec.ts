import type { Logger } from 'pino';
import type { WireValue } from '../types.js';
import { ArgumentError } from '../errors.js';
import { defaultLogger } from '../logger.js';
import type { ValueBinding, ValueKind } from './base.js';
import { PlainValue } from './plain.js';
import { Color, Point, Rectangle, Size } from './composite.js';
import { DateTime, Time } from './temporal.js';

/** Type tags of the wire value format. */
export const ValueType = {
  PLAIN: 0,
  RECTANGLE: 1,
  POINT: 2,
  SIZE: 3,
  COLOR: 4,
  DATETIME: 5,
  TIME: 6,
  UNKNOWN: -1,
} as const;

export type Value = PlainValue | Rectangle | Point | Size | Color | DateTime | Time;

type Decoder = (payload: readonly unknown[], binding: ValueBinding | undefined) => Value;

function decodePlain(payload: readonly unknown[], binding: ValueBinding | undefined): PlainValue {
  if (payload.length !== 1) {
    throw new ArgumentError(`PlainValue must be constructed with 1 argument, not ${payload.length}`);
  }
  return new PlainValue(payload[0], binding);
}

const DECODERS: ReadonlyMap<number, Decoder> = new Map<number, Decoder>([
  [ValueType.PLAIN, decodePlain],
  [ValueType.RECTANGLE, (payload, binding) => new Rectangle(payload, binding)],
  [ValueType.POINT, (payload, binding) => new Point(payload, binding)],
  [ValueType.SIZE, (payload, binding) => new Size(payload, binding)],
  [ValueType.COLOR, (payload, binding) => new Color(payload, binding)],
  [ValueType.DATETIME, (payload, binding) => new DateTime(payload, binding)],
  [ValueType.TIME, (payload, binding) => new Time(payload, binding)],
]);

const TYPE_IDS: Readonly<Record<Exclude<ValueKind, 'plain'>, number>> = {
  rectangle: ValueType.RECTANGLE,
  point: ValueType.POINT,
  size: ValueType.SIZE,
  color: ValueType.COLOR,
  datetime: ValueType.DATETIME,
  time: ValueType.TIME,
};

/**
 * Decode a tagged wire value. Type ids this version does not know are logged
 * and decoded as a plain value wrapping the payload array unchanged.
 *
 * @throws ArgumentError when the payload is empty or does not fit the type
 */
export function decodeValue(
  wire: WireValue,
  binding?: ValueBinding,
  logger: Logger = defaultLogger(),
): Value {
  const raw: unknown = wire;
  if (!Array.isArray(raw) || !Number.isInteger(raw[0])) {
    throw new ArgumentError(`Expected a tagged value [typeId, ...payload], got ${JSON.stringify(wire)}`);
  }
  const [typeId, ...payload] = wire;
  if (payload.length === 0) {
    throw new ArgumentError('Cannot create attribute, no data supplied');
  }

  const decoder = DECODERS.get(typeId);
  if (decoder === undefined) {
    if (typeId !== ValueType.UNKNOWN) {
      logger.warn({ typeId, property: binding?.name }, `Unknown type id ${typeId}`);
    }
    return new PlainValue<readonly unknown[]>(payload, binding, typeId);
  }
  return decoder(payload, binding);
}

/** The tagged wire form of a value; the inverse of {@link decodeValue}. */
export function encodeValue(value: Value): WireValue {
  if (value instanceof PlainValue) {
    const data: unknown = value.data;
    return value.typeId !== ValueType.PLAIN && Array.isArray(data)
      ? [value.typeId, ...data]
      : [ValueType.PLAIN, data];
  }
  return [TYPE_IDS[value.kind], ...value.data];
}

/**
 * WKB encoders for tests
 *
 * Produces ISO WKB / EWKB byte strings for Polygon, MultiPolygon and Point
 * geometry, in either byte order, optionally with extra Z/M ordinates or an
 * EWKB SRID.
 */

export type Ring = ReadonlyArray<readonly [number, number]>;

export interface EncodeOptions {
  readonly littleEndian?: boolean;
  /** 'iso' uses the +1000 type offset; 'ewkb' the high-bit flag */
  readonly z?: 'iso' | 'ewkb';
  /** ISO +3000 (ZM) type offset */
  readonly zm?: boolean;
  /** EWKB SRID (sets the SRID flag) */
  readonly srid?: number;
}

const EWKB_Z_FLAG = 0x80000000;
const EWKB_SRID_FLAG = 0x20000000;

class WkbWriter {
  private readonly parts: Buffer[] = [];

  constructor(private readonly littleEndian: boolean) {}

  u8(value: number): this {
    const buffer = Buffer.alloc(1);
    buffer.writeUInt8(value);
    this.parts.push(buffer);
    return this;
  }

  u32(value: number): this {
    const buffer = Buffer.alloc(4);
    if (this.littleEndian) {
      buffer.writeUInt32LE(value >>> 0);
    } else {
      buffer.writeUInt32BE(value >>> 0);
    }
    this.parts.push(buffer);
    return this;
  }

  f64(value: number): this {
    const buffer = Buffer.alloc(8);
    if (this.littleEndian) {
      buffer.writeDoubleLE(value);
    } else {
      buffer.writeDoubleBE(value);
    }
    this.parts.push(buffer);
    return this;
  }

  bytes(): Uint8Array {
    return new Uint8Array(Buffer.concat(this.parts));
  }
}

function extraOrdinates(options: EncodeOptions): number {
  if (options.zm) return 2;
  return options.z ? 1 : 0;
}

function writeHeader(writer: WkbWriter, baseType: number, options: EncodeOptions, withSrid: boolean): void {
  let type = baseType;
  if (options.zm) {
    type += 3000;
  } else if (options.z === 'iso') {
    type += 1000;
  } else if (options.z === 'ewkb') {
    type = (type | EWKB_Z_FLAG) >>> 0;
  }
  if (withSrid && options.srid !== undefined) {
    type = (type | EWKB_SRID_FLAG) >>> 0;
  }

  writer.u8(options.littleEndian === false ? 0 : 1).u32(type);
  if (withSrid && options.srid !== undefined) {
    writer.u32(options.srid);
  }
}

function writeRings(writer: WkbWriter, rings: readonly Ring[], options: EncodeOptions): void {
  writer.u32(rings.length);
  for (const ring of rings) {
    writer.u32(ring.length);
    for (const [x, y] of ring) {
      writer.f64(x).f64(y);
      for (let i = 0; i < extraOrdinates(options); i++) {
        writer.f64(99);
      }
    }
  }
}

export function encodePolygon(rings: readonly Ring[], options: EncodeOptions = {}): Uint8Array {
  const writer = new WkbWriter(options.littleEndian !== false);
  writeHeader(writer, 3, options, true);
  writeRings(writer, rings, options);
  return writer.bytes();
}

export function encodeMultiPolygon(
  polygons: ReadonlyArray<readonly Ring[]>,
  options: EncodeOptions = {}
): Uint8Array {
  const writer = new WkbWriter(options.littleEndian !== false);
  writeHeader(writer, 6, options, true);
  writer.u32(polygons.length);
  for (const rings of polygons) {
    writeHeader(writer, 3, options, false);
    writeRings(writer, rings, options);
  }
  return writer.bytes();
}

export function encodePoint(x: number, y: number, options: EncodeOptions = {}): Uint8Array {
  const writer = new WkbWriter(options.littleEndian !== false);
  writeHeader(writer, 1, options, true);
  writer.f64(x).f64(y);
  return writer.bytes();
}

/**
 * Closed counter-clockwise rectangle ring
 */
export function rect(minX: number, minY: number, maxX: number, maxY: number): Ring {
  return [
    [minX, minY],
    [maxX, minY],
    [maxX, maxY],
    [minX, maxY],
    [minX, minY],
  ];
}

export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}

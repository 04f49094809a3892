import type { Shape } from './shape.ts';

export interface HeapOptions {
  initialCapacity?: number;
  textEncoder?: TextEncoder;
  textDecoder?: TextDecoder;
}

/** First allocatable address. Everything below it is reserved so that 0 reads as nil. */
const BASE_ADDRESS = 8;

/**
 * Heap is the storage every value lives in while memcast converts it.
 *
 * It is a single growable little-endian buffer addressed by byte offsets, plus
 * a handle table for host objects that have no byte representation
 * (decimals, locales, dynamic maps). Address 0 and handle 0 both mean nil.
 *
 * Allocation is a zero-filled bump allocator. Growing the buffer replaces the
 * underlying ArrayBuffer, but since addresses are offsets they stay valid.
 */
export class Heap {
  buffer: ArrayBuffer;
  view: DataView;
  bytes: Uint8Array;
  position: number;
  capacity: number;
  readonly textEncoder: TextEncoder;
  readonly textDecoder: TextDecoder;
  private readonly handles: unknown[] = [null];

  constructor(options: HeapOptions = {}) {
    this.capacity = Math.max(options.initialCapacity || 1024, BASE_ADDRESS * 2);
    this.textEncoder = options.textEncoder || new TextEncoder();
    this.textDecoder = options.textDecoder || new TextDecoder();
    this.buffer = new ArrayBuffer(this.capacity);
    this.view = new DataView(this.buffer);
    this.bytes = new Uint8Array(this.buffer);
    this.position = BASE_ADDRESS;
  }

  /**
   * Bytes in use, including the reserved prefix.
   */
  get used(): number {
    return this.position;
  }

  private ensureCapacity(required: number): void {
    if (required > this.capacity) {
      while (this.capacity < required) {
        this.capacity *= 2;
      }
      const next = new ArrayBuffer(this.capacity);
      new Uint8Array(next).set(this.bytes);
      this.buffer = next;
      this.view = new DataView(next);
      this.bytes = new Uint8Array(next);
    }
  }

  /**
   * Allocate `size` zeroed bytes aligned to `align` and return their address.
   * Never returns 0, also for zero-sized requests.
   */
  alloc(size: number, align: number): number {
    const remainder = this.position % align;
    const address = remainder === 0 ? this.position : this.position + (align - remainder);
    this.ensureCapacity(address + size);
    this.bytes.fill(0, address, address + size);
    this.position = address + size;
    return address;
  }

  /**
   * Allocate zeroed storage for one value of `shape`.
   */
  allocate<T>(shape: Shape<T>): Ref<T> {
    return new Ref(this, shape, this.alloc(shape.size, shape.align));
  }

  /**
   * Write `value` into fresh storage for `shape`.
   */
  store<T>(shape: Shape<T>, value: T): Ref<T> {
    const ref = this.allocate(shape);
    shape.write(this, ref.address, value);
    return ref;
  }

  /**
   * Raw byte copy between two addresses.
   * Sizes of 8, 16 and 24 bytes (strings, slices, instants and most small
   * structs) are moved as 32-bit words.
   */
  copy(dst: number, src: number, size: number): void {
    const view = this.view;
    switch (size) {
      case 8:
        view.setUint32(dst, view.getUint32(src, true), true);
        view.setUint32(dst + 4, view.getUint32(src + 4, true), true);
        break;
      case 16:
        view.setUint32(dst, view.getUint32(src, true), true);
        view.setUint32(dst + 4, view.getUint32(src + 4, true), true);
        view.setUint32(dst + 8, view.getUint32(src + 8, true), true);
        view.setUint32(dst + 12, view.getUint32(src + 12, true), true);
        break;
      case 24:
        view.setUint32(dst, view.getUint32(src, true), true);
        view.setUint32(dst + 4, view.getUint32(src + 4, true), true);
        view.setUint32(dst + 8, view.getUint32(src + 8, true), true);
        view.setUint32(dst + 12, view.getUint32(src + 12, true), true);
        view.setUint32(dst + 16, view.getUint32(src + 16, true), true);
        view.setUint32(dst + 20, view.getUint32(src + 20, true), true);
        break;
      default:
        this.bytes.copyWithin(dst, src, src + size);
    }
  }

  /**
   * Whether every byte in `[address, address + size)` is zero.
   */
  isZeroed(address: number, size: number): boolean {
    const bytes = this.bytes;
    for (let i = address; i < address + size; i++) {
      if (bytes[i] !== 0) return false;
    }
    return true;
  }

  // === Handles ===

  /**
   * Register a host object and return its handle.
   */
  retain(value: object): number {
    this.handles.push(value);
    return this.handles.length - 1;
  }

  /**
   * Look up a handle. Handle 0 is nil.
   */
  resolve(handle: number): unknown {
    return this.handles[handle] ?? null;
  }

  // === Primitive Readers (Little Endian) ===

  readU8(offset: number): number {
    return this.view.getUint8(offset);
  }

  readI8(offset: number): number {
    return this.view.getInt8(offset);
  }

  readU16(offset: number): number {
    return this.view.getUint16(offset, true);
  }

  readI16(offset: number): number {
    return this.view.getInt16(offset, true);
  }

  readU32(offset: number): number {
    return this.view.getUint32(offset, true);
  }

  readI32(offset: number): number {
    return this.view.getInt32(offset, true);
  }

  readU64(offset: number): bigint {
    return this.view.getBigUint64(offset, true);
  }

  readI64(offset: number): bigint {
    return this.view.getBigInt64(offset, true);
  }

  readF32(offset: number): number {
    return this.view.getFloat32(offset, true);
  }

  readF64(offset: number): number {
    return this.view.getFloat64(offset, true);
  }

  readBool(offset: number): boolean {
    return this.view.getUint8(offset) !== 0;
  }

  readBytes(offset: number, length: number): Uint8Array {
    return this.bytes.subarray(offset, offset + length);
  }

  // === Primitive Writers (Little Endian) ===

  writeU8(offset: number, value: number): void {
    this.view.setUint8(offset, value);
  }

  writeI8(offset: number, value: number): void {
    this.view.setInt8(offset, value);
  }

  writeU16(offset: number, value: number): void {
    this.view.setUint16(offset, value, true);
  }

  writeI16(offset: number, value: number): void {
    this.view.setInt16(offset, value, true);
  }

  writeU32(offset: number, value: number): void {
    this.view.setUint32(offset, value, true);
  }

  writeI32(offset: number, value: number): void {
    this.view.setInt32(offset, value, true);
  }

  writeU64(offset: number, value: bigint): void {
    this.view.setBigUint64(offset, value, true);
  }

  writeI64(offset: number, value: bigint): void {
    this.view.setBigInt64(offset, value, true);
  }

  writeF32(offset: number, value: number): void {
    this.view.setFloat32(offset, value, true);
  }

  writeF64(offset: number, value: number): void {
    this.view.setFloat64(offset, value, true);
  }

  writeBool(offset: number, value: boolean): void {
    this.view.setUint8(offset, value ? 1 : 0);
  }

  // === Byte runs ===

  /**
   * Copy `bytes` into freshly allocated storage and return its address.
   * Empty input allocates nothing and returns 0.
   */
  allocBytes(bytes: Uint8Array): number {
    if (bytes.length === 0) return 0;
    const address = this.alloc(bytes.length, 1);
    this.bytes.set(bytes, address);
    return address;
  }

  /**
   * Write a `{ ptr: u32, len: u32 }` header holding the UTF-8 bytes of `text`.
   */
  writeText(offset: number, text: string): void {
    const encoded = this.textEncoder.encode(text);
    const address = this.allocBytes(encoded);
    this.writeU32(offset, address);
    this.writeU32(offset + 4, encoded.length);
  }

  readText(offset: number): string {
    const address = this.readU32(offset);
    const length = this.readU32(offset + 4);
    if (address === 0 || length === 0) return '';
    return this.textDecoder.decode(this.readBytes(address, length));
  }
}

/**
 * A typed reference to a value in a heap: the pair of a shape descriptor and
 * a data address. It plays the part of a generic (boxed) value.
 */
export class Ref<T = unknown> {
  constructor(
    readonly heap: Heap,
    readonly shape: Shape<T>,
    readonly address: number,
  ) {}

  /**
   * Read the referenced value back into a JavaScript value.
   */
  load(): T {
    return this.shape.read(this.heap, this.address);
  }
}

import { isValidName } from "./field_names.ts";
import { type FieldKind, Type } from "../type.ts";
import { PrimitiveType } from "../primitive/primitive_type.ts";
import type { RecordType } from "./record_type.ts";

/**
 * Parameters for defining a record field.
 */
export interface RecordFieldParams {
  /** The name of the field. */
  name: string;
  /** The type of the field: a primitive format or a nested record type. */
  type: Type;
  /** Optional documentation for the field. */
  doc?: string;
}

/**
 * Resolved description of a field, discriminated by kind. Exactly one of
 * the primitive format and the nested record type is present.
 */
export type FieldDescriptor =
  | { kind: "primitive"; name: string; type: PrimitiveType }
  | { kind: "struct"; name: string; type: RecordType };

/**
 * Returns true if the type describes a nested record.
 */
export function isRecordType(type: Type): type is RecordType {
  return type.getKind() === "struct";
}

/**
 * Represents a field in a record type.
 */
export class RecordField {
  #name: string;
  #type: Type;
  #doc?: string;

  /**
   * Constructs a new RecordField instance.
   */
  constructor(params: RecordFieldParams) {
    const { name, type, doc } = params;

    if (typeof name !== "string" || !isValidName(name)) {
      throw new Error(`Invalid record field name: ${name}`);
    }
    if (!(type instanceof Type)) {
      throw new Error(`Invalid field type for ${name}`);
    }
    if (!(type instanceof PrimitiveType) && !isRecordType(type)) {
      throw new Error(`Unsupported field type for ${name}`);
    }

    this.#name = name;
    this.#type = type;
    this.#doc = doc;
  }

  /**
   * Gets the name of the field.
   */
  public getName(): string {
    return this.#name;
  }

  /**
   * Gets the type of the field.
   */
  public getType(): Type {
    return this.#type;
  }

  /**
   * Gets the documentation of the field, if any.
   */
  public getDoc(): string | undefined {
    return this.#doc;
  }

  /**
   * Gets the kind of the field.
   */
  public getKind(): FieldKind {
    return this.#type.getKind();
  }

  /**
   * Gets the field descriptor used by the text writers.
   */
  public getDescriptor(): FieldDescriptor {
    const type = this.#type;
    if (isRecordType(type)) {
      return { kind: "struct", name: this.#name, type };
    }
    if (type instanceof PrimitiveType) {
      return { kind: "primitive", name: this.#name, type };
    }
    throw new Error(`Unsupported field type for ${this.#name}`);
  }
}

import { ElementError } from "../document/errors.js";

export type StorageKind = "integer" | "float";

export type ScalarType =
  | "int16"
  | "uint16"
  | "int32"
  | "uint32"
  | "int64"
  | "uint64"
  | "float32"
  | "float64";

export type TypeName =
  | "int_2s"
  | "int_2u"
  | "int_4s"
  | "int_4u"
  | "int_8s"
  | "int_8u"
  | "int"
  | "real_4"
  | "real_8"
  | "float"
  | "double";

type TypeEntry = {
  kind: StorageKind;
  scalar: ScalarType;
};

const TYPE_TABLE: Record<TypeName, TypeEntry> = {
  int_2s: { kind: "integer", scalar: "int16" },
  int_2u: { kind: "integer", scalar: "uint16" },
  int_4s: { kind: "integer", scalar: "int32" },
  int_4u: { kind: "integer", scalar: "uint32" },
  int_8s: { kind: "integer", scalar: "int64" },
  int_8u: { kind: "integer", scalar: "uint64" },
  int: { kind: "integer", scalar: "int32" },
  real_4: { kind: "float", scalar: "float32" },
  real_8: { kind: "float", scalar: "float64" },
  float: { kind: "float", scalar: "float32" },
  double: { kind: "float", scalar: "float64" },
};

// Names written out for each scalar type. Aliases such as "int" and "double"
// are accepted on input but never produced.
const CANONICAL_NAMES: Record<ScalarType, TypeName> = {
  int16: "int_2s",
  uint16: "int_2u",
  int32: "int_4s",
  uint32: "int_4u",
  int64: "int_8s",
  uint64: "int_8u",
  float32: "real_4",
  float64: "real_8",
};

export const isTypeName = (name: string): name is TypeName =>
  Object.prototype.hasOwnProperty.call(TYPE_TABLE, name);

const lookup = (name: string): TypeEntry => {
  if (!isTypeName(name)) {
    throw new ElementError("UnknownType", `Unrecognized array type "${name}"`);
  }
  return TYPE_TABLE[name];
};

export const classify = (name: string): StorageKind => lookup(name).kind;

export const storageScalarType = (name: string): ScalarType => lookup(name).scalar;

export const nameFor = (scalar: ScalarType): TypeName => CANONICAL_NAMES[scalar];

export const kindOf = (scalar: ScalarType): StorageKind =>
  scalar === "float32" || scalar === "float64" ? "float" : "integer";

export const isBigIntScalar = (scalar: ScalarType): scalar is "int64" | "uint64" =>
  scalar === "int64" || scalar === "uint64";

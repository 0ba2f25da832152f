export { IndexSequencer } from "./array/indexSequencer.js";
export { NdArray } from "./array/ndarray.js";
export type { Scalar, ScalarStorage } from "./array/ndarray.js";
export { dimensionsFromShape, resolveShape, shapeSize } from "./array/shape.js";
export type { DimensionList, Index, Shape } from "./array/shape.js";
export { classify, isTypeName, nameFor, storageScalarType } from "./array/types.js";
export type { ScalarType, StorageKind, TypeName } from "./array/types.js";
export { Tokenizer, TokenizerError } from "./tokenizer/tokenizer.js";
export { Element } from "./document/element.js";
export type { Attributes } from "./document/element.js";
export { Dim, Document, LigoLw, Stream, TagName } from "./document/elements.js";
export { ElementError, isElementError } from "./document/errors.js";
export type { ElementErrorKind } from "./document/errors.js";
export { DocumentBuilder } from "./document/builder.js";
export type { ContentHandler } from "./document/builder.js";
export { StringSink } from "./document/output.js";
export type { TextSink } from "./document/output.js";
export { createDocumentParser, parseDocumentStream, parseDocumentString } from "./parser/documentParser.js";
export { ArrayElement, ArrayStream, formatScalar, fromArray } from "./codec/arrayElement.js";
export type { ArrayContents, ArrayStreamOptions, FromArrayOptions } from "./codec/arrayElement.js";
export { ArrayDocumentBuilder, readDocument, readDocumentStream, writeDocument } from "./codec/handler.js";
export type { ParseOptions } from "./codec/handler.js";
export { compareArrayNames, getAllArrays, getArrayByName, getArraysByName, stripArrayName } from "./codec/names.js";
export { loadDocument, saveDocument } from "./io/documents.js";
export type { LoadOptions, SaveOptions } from "./io/documents.js";

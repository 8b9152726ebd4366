import type { ConstraintCategory } from "../model/constraint.js";

/**
 * Leading clause for "… requires that `'a` must outlive `'b`". Every phrase
 * ends with a space so it can be prefixed directly; categories with nothing
 * useful to say render as the empty string.
 */
const CATEGORY_PHRASES: Readonly<Record<ConstraintCategory, string>> = {
  Assignment: "assignment ",
  Return: "returning this value ",
  Cast: "cast ",
  CallArgument: "argument ",
  TypeAnnotation: "type annotation ",
  ClosureBounds: "closure body ",
  SizedBound: "proving this value is `Sized` ",
  CopyBound: "copying this value ",
  OpaqueType: "opaque type ",
  Boring: "",
  BoringNoLocation: "",
  Internal: "",
};

export function categoryPhrase(category: ConstraintCategory): string {
  return CATEGORY_PHRASES[category];
}

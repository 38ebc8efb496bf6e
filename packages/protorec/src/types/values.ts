/**
 * Shape shared by every storable message value.
 * `kind` selects the schema; the rest of the value is the schema's business.
 */
export interface Variant {
  readonly kind: string;
}

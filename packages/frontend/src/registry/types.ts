/**
 * Raw registry entities, as read from the XML before any model building
 */

export type RawTypedef = {
  /** C text in front of the declared name (or the whole declaration) */
  readonly prefix: string;
  readonly name: string;
  /** C text directly following the declared name */
  readonly postfix: string;
  /** Function-pointer typedef carrying the platform calling convention */
  readonly isApiEntry: boolean;
};

export type RawEnum = {
  readonly name: string;
  readonly value: string;
  readonly groups: readonly string[];
};

export type RawParam = {
  readonly type: string;
  readonly name: string;
  readonly group?: string;
};

export type RawCommand = {
  readonly name: string;
  readonly returnType: string;
  readonly params: readonly RawParam[];
  /** Name of the command this one is declared an alias of */
  readonly alias?: string;
};

export type RawFeature = {
  readonly api: string;
  readonly name: string;
  readonly number: string;
  readonly commands: readonly string[];
};

export type RawExtension = {
  readonly name: string;
  /** `supported` attribute split on `|` */
  readonly supported: readonly string[];
  readonly commands: readonly string[];
};

export type Registry = {
  readonly fileName: string;
  readonly comment: string;
  readonly typedefs: readonly RawTypedef[];
  readonly enums: readonly RawEnum[];
  readonly commands: readonly RawCommand[];
  readonly features: readonly RawFeature[];
  readonly extensions: readonly RawExtension[];
};

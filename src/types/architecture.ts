/**
 * Core architecture types extracted from Rust sources
 */

export type TypeKind = 'struct' | 'enum' | 'trait';
export type Visibility = 'public' | 'crate' | 'restricted' | 'private';

export interface Location {
  filePath: string;
  startLine: number;
  endLine: number;
}

export interface FieldDefinition {
  name: string;
  type: string;
}

export interface TypeDefinition {
  name: string;
  qualifiedName: string;
  kind: TypeKind;
  visibility: Visibility;
  fields: FieldDefinition[];
  location: Location;
}

export interface CallSite {
  callee: string;       // Textual callee, e.g. "Widget::new" or "self.repo.save"
  method: string;       // Final segment of the callee
  target: string | null; // Resolved qualified type name, null when unresolved
  line: number;
}

export interface Method {
  name: string;
  signature: string;
  returnType: string | null;
  visibility: Visibility;
  calls: CallSite[];
  location: Location;
}

export interface ImplBlock {
  target: string;        // Target type as written, generics stripped
  trait: string | null;  // Implemented trait as written, generic arguments kept
  methods: Method[];
  location: Location;
}

export interface Import {
  path: string;
  alias: string | null;
}

export interface SourceUnit {
  filePath: string;
  modulePath: string;
  types: TypeDefinition[];
  impls: ImplBlock[];
  imports: Import[];
}

export interface DuplicateLocation {
  filePath: string;
  line: number;
}

export interface DuplicateType {
  qualifiedName: string;
  locations: DuplicateLocation[];
}

export interface ArchitectureSnapshot {
  root: string;
  units: Map<string, SourceUnit>;
  registry: Map<string, string>; // qualified type name -> owning file path
  duplicates: DuplicateType[];
}

export interface SkippedFile {
  filePath: string;
  reason: string;
}

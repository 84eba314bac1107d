/**
 * Types for project file generators
 */

export interface EnvVariable {
  name: string;
  value: string;
  comment?: string;
}

export interface EnvSection {
  header: string;
  variables: EnvVariable[];
  /** Trailing comment lines */
  notes?: string[];
}

export interface GeneratedFile {
  path: string;
  content: string;
  mode?: number;
}

export interface ProjectOptions {
  name: string;
  description?: string;
  enabledServices: string[];
}

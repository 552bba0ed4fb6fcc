/**
 * Terminal output types
 */

export type SemanticColor = 'success' | 'error' | 'warning' | 'info' | 'path';

export interface BoxOptions {
  title?: string;
  borderColor?: string;
  padding?: number;
  margin?: number;
}

/**
 * Recommendation Types
 *
 * Produced per analysis or planning pass; never persisted on their own.
 */

export type Priority = 'high' | 'medium' | 'low';

export interface Recommendation {
  /** Machine-readable category, e.g. `quiz_improvement` */
  type: string;
  priority: Priority;
  title: string;
  /** Why the recommendation was made */
  description: string;
  /** Concrete suggested actions */
  actionItems: string[];
}

/**
 * Learner and Course Types
 *
 * A course's `topics` list is the unit of content volume: plans partition it
 * across weeks and completion predictions count remaining topics against it.
 */

export interface Learner {
  id: string;
  name: string;
  createdAt: Date;
}

export interface Course {
  id: string;
  title: string;
  /** Ordered topic identifiers */
  topics: string[];
  createdAt: Date;
}

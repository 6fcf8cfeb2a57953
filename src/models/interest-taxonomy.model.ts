/**
 * Interest Taxonomy Models
 *
 * Seeded categories and tags a profile can select from. Selected tag names
 * become the profile's top interest labels.
 */

import { z } from 'zod';

export interface InterestCategory {
  id: number;
  name: string;
  slug: string;
  position: number;
}

export interface InterestTag {
  id: number;
  categoryId: number;
  name: string;
  slug: string;
  position: number;
}

export interface InterestCategoryWithTags extends InterestCategory {
  tags: InterestTag[];
}

/**
 * Seed file shape: ordered categories, each with ordered tag names.
 */
export const taxonomySeedSchema = z.object({
  categories: z.array(
    z.object({
      name: z.string().min(1),
      tags: z.array(z.string().min(1)),
    })
  ),
});

export type TaxonomySeed = z.infer<typeof taxonomySeedSchema>;

/**
 * URL-friendly identifier: ASCII, lower-case, words joined by hyphens.
 * "Cooking & Food" -> "cooking-food".
 */
export function slugify(name: string): string {
  return name
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^\w\s-]/g, '')
    .trim()
    .replace(/[-\s]+/g, '-')
    .replace(/^[-_]+|[-_]+$/g, '');
}

/**
 * Company name resolution, specified but not yet implemented.
 */

import { z } from 'zod';
import {
  ImplementThis,
  withPostDescription,
  withPrecondition,
  withPreDescription,
  withSpecification,
} from '../contracts/index.js';

export const CompanyRecordSchema = z.object({
  id: z.number().int(),
  name: z.string().min(1),
  url: z.string().url(),
});

export type CompanyRecord = z.infer<typeof CompanyRecordSchema>;

const CompanyDatabaseSchema = z.array(CompanyRecordSchema);

function resolverPrecondition(text: string, database: CompanyRecord[]): boolean {
  return text.trim().length > 0 && CompanyDatabaseSchema.safeParse(database).success;
}

export const resolveCompanyNames = withSpecification('Resolves company names in text using database lookup')(
  withPreDescription(
    "Text must be a non-empty string and database must be a list of valid company records with 'id', 'name', and 'url' fields",
  )(
    withPostDescription(
      'Returns a list of company records that were found in the text, preserving database structure with id, name, and url',
    )(
      withPrecondition(resolverPrecondition)(function resolveCompanyNames(
        _text: string,
        _database: CompanyRecord[],
      ): CompanyRecord[] {
        throw new ImplementThis('Company name resolution not yet implemented');
      }),
    ),
  ),
);

import { z } from 'zod';
import { jsonRequest } from './api.js';
import { characterSchema } from './schemas.js';
import type { ApiRequest } from '../lib/batch.js';
import type { AccountContext, Character } from '../types.js';

export function charactersRequest(baseUrl: string, context: AccountContext): ApiRequest<Character[]> {
  return jsonRequest({
    label: 'characters',
    baseUrl,
    path: 'characters',
    query: { ids: 'all' },
    schema: z.array(characterSchema),
    onComplete: (characters) => {
      context.characters = characters;
    },
  });
}

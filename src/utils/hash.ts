import { createHash } from 'node:crypto';

export const hashString = (input: string) => createHash('sha256').update(input).digest('hex');

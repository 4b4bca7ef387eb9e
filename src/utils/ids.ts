import { v4 as uuidv4 } from 'uuid';

export function newQueryId(): string {
  return `q_${uuidv4()}`;
}

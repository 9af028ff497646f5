import { SecretResolver } from '../secret-resolver.js';

// Values that are not env:// references are used as written
export class DirectValueResolver implements SecretResolver {
  canResolve(reference: string): boolean {
    return !reference.startsWith('env://');
  }

  async resolve(reference: string): Promise<string> {
    return reference;
  }

  getDisplayName(): string {
    return 'Direct Value';
  }
}

import { Plugin } from '../../../../../src/core/plugins';

@Plugin({ key: 'deep' })
export class DeepStore {
  readonly kind = 'deep';
}

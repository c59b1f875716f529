export {
  BINDING_MIRROR_ID,
  BindingMirrorSchema,
  BindingTargetSchema,
  type Binding,
  type BindingMirror,
  type BindingRepository,
  type BindingTarget,
} from './ports.js';
export { makeBindingRepo, type BindingRepoOptions } from './binding-repo.js';
export {
  createBindingRegistry,
  type BindingRegistry,
  type BindingRegistryOptions,
} from './binding-registry.js';

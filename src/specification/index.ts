export {
  createSpecification,
  parseSpecification,
  loadSpecification,
  camelizeKeys,
  deepFreeze,
} from './loader.js';

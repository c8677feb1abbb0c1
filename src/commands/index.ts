export { buildCommand } from './build';
export { listCommand } from './list';
export { showCommand } from './show';

export { ParagraphBatcher } from './paragraph-batcher';

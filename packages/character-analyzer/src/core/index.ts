export {
  BaseLLMComponent,
  type BaseLLMComponentOptions,
} from './base-llm-component';
export { TextLLMComponent } from './text-llm-component';

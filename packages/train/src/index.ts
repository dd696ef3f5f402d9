export {
  RecognizerGenerator,
  makeRecognizerGenerator,
  filterText,
  countIllegal,
  type RecognizerSample,
  type RecognizerGeneratorOptions,
} from "./data.js";

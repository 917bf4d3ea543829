export {
  compareResults,
  compareReturnCode,
  compareStream
} from './compare';
export type {
  AssertionExpectation,
  AssertionFailure,
  AssertionReport,
  ReturnCodeFailure,
  StreamFailure,
  StreamName
} from './compare';
export { reportAssertions } from './report';

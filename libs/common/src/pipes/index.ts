export { ParseDatePipe, isCalendarDate } from './parse-date.pipe';
export { RequiredParamPipe } from './required-param.pipe';

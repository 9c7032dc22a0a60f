import { Matches } from 'class-validator';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;

export class DashboardFilterDto {
  @Matches(DATE_PATTERN, { message: 'startDate must use yyyy-MM-dd' })
  startDate!: string;

  @Matches(TIME_PATTERN, { message: 'startTime must use HH:mm' })
  startTime!: string;

  @Matches(DATE_PATTERN, { message: 'endDate must use yyyy-MM-dd' })
  endDate!: string;

  @Matches(TIME_PATTERN, { message: 'endTime must use HH:mm' })
  endTime!: string;
}

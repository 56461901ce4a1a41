import { Aircraft } from '../logbook/entities/aircraft.entity';
import { Flight } from '../logbook/entities/flight.entity';

export type Cell = string | number | null;

export interface ColumnSpec<T> {
  header: string;
  /** Columns without a source are always emitted blank. */
  value?: (row: T) => Cell;
}

export const yesNo = (value: boolean): string => (value ? 'Yes' : 'No');

/** Hour quantities keep the two decimals they are stored with. */
export const hours = (value: number | null): string | null =>
  value === null || value === undefined ? null : value.toFixed(2);

const blank = <T>(header: string): ColumnSpec<T> => ({ header });

export const AIRCRAFT_COLUMNS: ColumnSpec<Aircraft>[] = [
  { header: 'AircraftID', value: (a) => a.guid },
  blank('EquipmentType'),
  blank('TypeCode'),
  { header: 'Year', value: (a) => a.record_modified },
  { header: 'Make', value: (a) => a.make },
  { header: 'Model', value: (a) => a.model },
  { header: 'Category', value: (a) => a.category },
  { header: 'Class', value: (a) => a.aircraft_class },
  blank('GearType'),
  blank('EngineType'),
  { header: 'Complex', value: (a) => yesNo(a.complex) },
  { header: 'HighPerformance', value: (a) => yesNo(a.high_perf) },
  blank('Pressurized'),
  { header: 'TAA', value: (a) => yesNo(a.aerobatic) },
];

export const FLIGHT_COLUMNS: ColumnSpec<Flight>[] = [
  { header: 'Date', value: (f) => f.date },
  { header: 'AircraftID', value: (f) => f.aircraft?.guid ?? null },
  { header: 'From', value: (f) => f.from_airport },
  { header: 'To', value: (f) => f.to_airport },
  { header: 'Route', value: (f) => f.route },
  { header: 'TimeOut', value: (f) => f.time_out },
  { header: 'TimeOff', value: (f) => f.time_off },
  { header: 'TimeOn', value: (f) => f.time_on },
  { header: 'TimeIn', value: (f) => f.time_in },
  { header: 'OnDuty', value: (f) => f.on_duty },
  { header: 'OffDuty', value: (f) => f.off_duty },
  { header: 'TotalTime', value: (f) => hours(f.total_time) },
  { header: 'PIC', value: (f) => hours(f.pic) },
  { header: 'SIC', value: (f) => hours(f.sic) },
  { header: 'Night', value: (f) => hours(f.night) },
  { header: 'Solo', value: (f) => hours(f.solo) },
  { header: 'CrossCountry', value: (f) => hours(f.cross_country) },
  { header: 'NVG', value: (f) => hours(f.nvg) },
  { header: 'NVGOps', value: (f) => hours(f.nvg_ops) },
  { header: 'Distance', value: (f) => hours(f.distance) },
  { header: 'DayTakeoffs', value: (f) => f.day_takeoffs },
  { header: 'DayLandingsFullStop', value: (f) => f.day_landings_full_stop },
  { header: 'NightTakeoffs', value: (f) => f.night_takeoffs },
  { header: 'NightLandingsFullStop', value: (f) => f.night_landings_full_stop },
  { header: 'AllLandings', value: (f) => f.all_landings },
  { header: 'ActualInstrument', value: (f) => hours(f.actual_instrument) },
  { header: 'SimulatedInstrument', value: (f) => hours(f.simulated_instrument) },
  { header: 'HobbsStart', value: (f) => hours(f.hobbs_start) },
  { header: 'HobbsEnd', value: (f) => hours(f.hobbs_end) },
  { header: 'TachStart', value: (f) => hours(f.tach_start) },
  { header: 'TachEnd', value: (f) => hours(f.tach_end) },
  { header: 'Holds', value: (f) => f.holds },
  { header: 'Approach1', value: (f) => f.approach1 },
  { header: 'Approach2', value: (f) => f.approach2 },
  { header: 'Approach3', value: (f) => f.approach3 },
  { header: 'Approach4', value: (f) => f.approach4 },
  { header: 'Approach5', value: (f) => f.approach5 },
  { header: 'Approach6', value: (f) => f.approach6 },
  { header: 'DualGiven', value: (f) => hours(f.dual_given) },
  { header: 'DualReceived', value: (f) => hours(f.dual_received) },
  { header: 'SimulatedFlight', value: (f) => hours(f.simulated_flight) },
  { header: 'GroundTraining', value: (f) => hours(f.ground_training) },
  { header: 'InstructorName', value: (f) => f.instructor_name },
  { header: 'InstructorComments', value: (f) => f.instructor_comments },
  blank('Person1'),
  blank('Person2'),
  blank('Person3'),
  blank('Person4'),
  blank('Person5'),
  blank('Person6'),
  { header: 'FlightReview', value: (f) => yesNo(f.flight_review) },
  { header: 'Checkride', value: (f) => yesNo(f.checkride) },
  { header: 'IPC', value: (f) => yesNo(f.ipc) },
  { header: 'NVGProficiency', value: (f) => yesNo(f.nvg_proficiency) },
  blank('FAA6158'),
  blank('[Text]CustomFieldName'),
  blank('[Numeric]CustomFieldName'),
  blank('[Hours]CustomFieldName'),
  blank('[Counter]CustomFieldName'),
  blank('[Date]CustomFieldName'),
  blank('[DateTime]CustomFieldName'),
  blank('[Toggle]CustomFieldName'),
  { header: 'PilotComments', value: (f) => f.pilot_comments },
];

export function toRow<T>(columns: ColumnSpec<T>[], row: T): string[] {
  return columns.map(({ value }) => {
    const cell = value ? value(row) : null;
    return cell === null || cell === undefined ? '' : String(cell);
  });
}

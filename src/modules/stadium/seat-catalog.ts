import { SeatType } from './seat.schema';

export interface SeatRecord {
  id: string;
  stadiumId: string;
  section: string;
  row: string;
  number: number;
  seatType: SeatType;
  price: number;
  /** Display label, e.g. "NORTH-C12" */
  label: string;
}

/**
 * Read-only view over the physical seats of stadiums.
 */
export abstract class SeatCatalog {
  /**
   * Seats of the stadium among `seatIds`. Unknown ids, and seats of other
   * stadiums, are left out.
   */
  abstract findSeats(
    stadiumId: string,
    seatIds: readonly string[],
  ): Promise<SeatRecord[]>;

  abstract listSeats(stadiumId: string): Promise<SeatRecord[]>;
}

export function seatLabel(section: string, row: string, number: number): string {
  return `${section}-${row}${number}`;
}

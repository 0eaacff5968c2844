/**
 * Lookup of customers known to the system. Booking only needs to know a
 * customer exists before holding seats for them.
 */
export abstract class CustomerDirectory {
  abstract exists(customerId: string): Promise<boolean>;
}

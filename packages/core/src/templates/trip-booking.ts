import { Saga } from '../saga.js';
import type { SagaDependencies } from '../saga.js';
import type { SagaOptions } from '../options.js';
import { AggregatedCompensationError } from '../errors.js';

/**
 * Activities a trip booking depends on.  Each booking returns the id the
 * matching cancellation needs.
 */
export interface TripBookingActivities {
  reserveCar(tripId: string): Promise<string>;
  bookHotel(tripId: string): Promise<string>;
  bookFlight(tripId: string): Promise<string>;
  cancelCar(reservationId: string, tripId: string): Promise<void>;
  cancelHotel(bookingId: string, tripId: string): Promise<void>;
  cancelFlight(bookingId: string, tripId: string): Promise<void>;
}

/** Ids of a fully booked trip. */
export interface TripBooking {
  tripId: string;
  carReservationId: string;
  hotelBookingId: string;
  flightBookingId: string;
}

/**
 * A template saga that books a car, a hotel and a flight for one trip.
 *
 * **Usage**: Copy this function and replace the activities with real
 * service calls.  Every cancellation is registered only after its booking
 * succeeds.  When a booking fails the completed ones are cancelled in
 * reverse order and the booking error is rethrown unchanged; if a
 * cancellation fails too, an {@link AggregatedCompensationError} whose
 * `cause` is the booking error is thrown instead.
 *
 * @example
 * ```typescript
 * import { bookTrip } from '@saga-ledger/core';
 *
 * const booking = await bookTrip('trip-1', activities, { continueWithError: true });
 * ```
 */
export async function bookTrip(
  tripId: string,
  activities: TripBookingActivities,
  options?: SagaOptions,
  deps?: SagaDependencies,
): Promise<TripBooking> {
  const saga = new Saga(options, deps);
  try {
    const carReservationId = await saga.perform(
      'reserve-car',
      () => activities.reserveCar(tripId),
      (id) => activities.cancelCar(id, tripId),
    );
    const hotelBookingId = await saga.perform(
      'book-hotel',
      () => activities.bookHotel(tripId),
      (id) => activities.cancelHotel(id, tripId),
    );
    const flightBookingId = await saga.perform(
      'book-flight',
      () => activities.bookFlight(tripId),
      (id) => activities.cancelFlight(id, tripId),
    );
    return { tripId, carReservationId, hotelBookingId, flightBookingId };
  } catch (err) {
    try {
      await saga.compensate();
    } catch (compensationErr) {
      if (compensationErr instanceof AggregatedCompensationError) {
        throw new AggregatedCompensationError(compensationErr.failures, err);
      }
      throw compensationErr;
    }
    throw err;
  }
}

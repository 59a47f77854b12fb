export { bookTrip } from './trip-booking.js';
export type { TripBookingActivities, TripBooking } from './trip-booking.js';

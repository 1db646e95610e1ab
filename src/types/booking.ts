export type BookingStatus = 'pending' | 'confirmed' | 'cancelled';
export type PaymentStatus = 'pending' | 'confirmed' | 'rejected';

/**
 * Booking represents one confirmed seat request. Created once, at the end of
 * the booking flow; only the payment flow changes it afterwards.
 */
export interface Booking {
  bookingId: string;
  userId: string;
  route: string;
  travelDate: string;
  passengerName: string;
  regNumber: string;
  phone: string;
  seat: number;
  amount: number;
  status: BookingStatus;
  paymentStatus: PaymentStatus;
  createdAt: Date;
}

export type NewBooking = Pick<
  Booking,
  'userId' | 'route' | 'travelDate' | 'passengerName' | 'regNumber' | 'phone' | 'seat' | 'amount'
>;

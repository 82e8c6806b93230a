import { stringify } from 'csv-stringify/sync';
import { Attendee } from '../types';

const COLUMNS = [
  { key: 'name', header: 'Name' },
  { key: 'email', header: 'Email' },
  { key: 'phone', header: 'Phone' },
  { key: 'rsvp', header: 'RSVP' },
  { key: 'checkedIn', header: 'Checked In' },
];

export const attendeesToCSV = (attendees: Attendee[]): string =>
  stringify(
    attendees.map((attendee) => ({
      name: attendee.name,
      email: attendee.email,
      phone: attendee.phone,
      rsvp: attendee.rsvp_status,
      checkedIn: attendee.checked_in ? 1 : 0,
    })),
    {
      header: true,
      columns: COLUMNS,
      record_delimiter: 'windows',
    }
  );

export const csvFilename = (eventId: number): string => `event_${eventId}_attendees.csv`;

export const RSVP_STATUSES = ['Attending', 'Not Attending', 'Maybe'] as const;

export type RSVPStatus = (typeof RSVP_STATUSES)[number];

export const DEFAULT_RSVP_STATUS: RSVPStatus = 'Attending';

export interface Event {
  id: number;
  title: string;
  description: string;
  date: string;
  location: string;
  created_at: Date;
}

export interface Attendee {
  id: number;
  event_id: number;
  name: string;
  email: string;
  phone: string;
  // Not constrained at the storage level; rows written before the
  // status list existed may hold other values.
  rsvp_status: string;
  checked_in: boolean;
  created_at: Date;
}

export interface CreateEventRequest {
  title: string;
  description: string;
  date: string;
  location: string;
}

export interface CreateRSVPRequest {
  name: string;
  email: string;
  phone: string;
  status: RSVPStatus;
}

export interface Branding {
  appName: string;
  footerTagline: string;
  authorName: string;
  githubUrl: string;
  linkedinUrl: string;
}

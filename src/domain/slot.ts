import { ValidationError } from '@observatory/shared';

import type { SlotResource } from '../dtos';
import type { WeatherAssessment } from '../modules/weather/domain/rating';

export const TITLE_MAX_LENGTH = 30;
export const DESCRIPTION_MAX_LENGTH = 255;

export interface SlotProps {
  id: number;
  title: string;
  description: string;
  startTime: Date;
  endTime: Date;
  maxBookings: number;
  available: boolean;
  weatherRating: number | null;
  weatherWarning: boolean;
  weatherForecast: boolean;
}

export type SlotDraft = Omit<SlotProps, 'id'>;

export interface SlotWindow {
  title: string;
  description: string;
  startTime: Date;
  endTime: Date;
  maxBookings: number;
}

export interface SlotDatabaseRow {
  id: number;
  title: string;
  description: string;
  start_time: Date;
  end_time: Date;
  max_bookings: number;
  available: boolean;
  weather_rating: number | null;
  weather_warning: boolean;
  weather_forecast: boolean;
}

export class Slot {
  private constructor(private readonly props: SlotProps) {}

  /** Fresh, available slot carrying the weather known at write time. */
  static draft(window: SlotWindow, weather: WeatherAssessment): SlotDraft {
    assertWindow(window.startTime, window.endTime);

    return {
      title: window.title,
      description: window.description,
      startTime: new Date(window.startTime),
      endTime: new Date(window.endTime),
      maxBookings: window.maxBookings,
      available: true,
      weatherRating: weather.rating,
      weatherWarning: weather.warning,
      weatherForecast: weather.forecastAvailable
    };
  }

  static fromPersistence(row: SlotDatabaseRow): Slot {
    return new Slot({
      id: row.id,
      title: row.title,
      description: row.description,
      startTime: new Date(row.start_time),
      endTime: new Date(row.end_time),
      maxBookings: row.max_bookings,
      available: row.available,
      weatherRating: row.weather_rating === null ? null : Number(row.weather_rating),
      weatherWarning: row.weather_warning,
      weatherForecast: row.weather_forecast
    });
  }

  get id(): number {
    return this.props.id;
  }

  get startTime(): Date {
    return this.props.startTime;
  }

  get endTime(): Date {
    return this.props.endTime;
  }

  get maxBookings(): number {
    return this.props.maxBookings;
  }

  get available(): boolean {
    return this.props.available;
  }

  get weatherRating(): number | null {
    return this.props.weatherRating;
  }

  hasStarted(now: Date): boolean {
    return this.props.startTime.getTime() <= now.getTime();
  }

  /** Editable only while both ends of the window are still ahead. */
  isModifiable(now: Date): boolean {
    return (
      this.props.startTime.getTime() >= now.getTime() &&
      this.props.endTime.getTime() >= now.getTime()
    );
  }

  reschedule(window: SlotWindow, weather: WeatherAssessment): void {
    Object.assign(this.props, Slot.draft(window, weather));
  }

  /** `available` mirrors the confirmed count; the count stays the source of truth. */
  syncAvailability(confirmedCount: number): boolean {
    const available = confirmedCount < this.props.maxBookings;
    const changed = available !== this.props.available;
    this.props.available = available;
    return changed;
  }

  /**
   * Applies a periodic refresh. Without forecast data the previous rating is
   * kept and only the forecast flag drops.
   */
  applyWeatherRefresh(weather: WeatherAssessment): void {
    this.props.weatherForecast = weather.forecastAvailable;
    if (!weather.forecastAvailable) return;

    this.props.weatherRating = weather.rating;
    this.props.weatherWarning = weather.warning;
  }

  toPersistence(): SlotDatabaseRow {
    return {
      id: this.props.id,
      title: this.props.title,
      description: this.props.description,
      start_time: new Date(this.props.startTime),
      end_time: new Date(this.props.endTime),
      max_bookings: this.props.maxBookings,
      available: this.props.available,
      weather_rating: this.props.weatherRating,
      weather_warning: this.props.weatherWarning,
      weather_forecast: this.props.weatherForecast
    };
  }

  toDTO(): SlotResource {
    return {
      id: this.props.id,
      title: this.props.title,
      description: this.props.description,
      startTime: this.props.startTime.toISOString(),
      endTime: this.props.endTime.toISOString(),
      maxBookings: this.props.maxBookings,
      available: this.props.available,
      weatherRating: this.props.weatherRating,
      weatherWarning: this.props.weatherWarning,
      weatherForecast: this.props.weatherForecast
    };
  }
}

function assertWindow(start: Date, end: Date): void {
  if (Number.isNaN(start.valueOf()) || Number.isNaN(end.valueOf())) {
    throw new ValidationError('Invalid start or end time for slot');
  }

  if (start.getTime() >= end.getTime()) {
    throw new ValidationError('Slot end must be after start');
  }
}

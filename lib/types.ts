export type RoomStatus = "free" | "occupied";

/** Dashboard-facing status (timetable bookings count as Full) */
export type DisplayStatus = "Free" | "Partial" | "Full";

export type DayName = "Mon" | "Tue" | "Wed" | "Thu" | "Fri" | "Sat" | "Sun";

/** Static room attributes, as they come from rooms.csv */
export type RoomSeed = {
  roomId: string;
  block: string;
  capacity: number;
  /** lecture | lab | auditorium (free text is accepted) */
  type: string;
  /** "Yes" / "No" */
  ac: string;
  lat: number;
  lon: number;
  /** comma separated, e.g. "projector,whiteboard" */
  amenities: string;
};

export type Room = RoomSeed & {
  occupancyLevel: number;
  status: RoomStatus;
  /** last occupancy write (ISO), null until the first one */
  updatedAt: string | null;
};

/** Room as returned by the read endpoints */
export type RoomView = Room & {
  /** has a timetable entry in the current day/slot */
  booked: boolean;
};

export type TimetableSeed = {
  roomId: string;
  day: DayName;
  slot: number;
  course: string;
};

export type TimetableEntry = TimetableSeed & {
  /** HH:MM */
  startTime: string;
  endTime: string;
};

export type OccupancyRecord = {
  id: number;
  roomId: string;
  timestamp: string;
  occupancyLevel: number;
};

export type RoomFilter = {
  block?: string;
  type?: string;
  minCapacity?: number;
};

export type RoomDetail = {
  room: RoomView;
  timetable: TimetableEntry[];
  occupancyHistory: OccupancyRecord[];
};

export type HeatmapCell = {
  block: string;
  avgOccupancy: number;
  samples: number;
};

export type BlockSummary = {
  block: string;
  rooms: number;
  capacity: number;
  /** mean of current room levels, rounded */
  avgOccupancy: number;
};

export type AnalyticsSummary = {
  totalRooms: number;
  totalCapacity: number;
  blockCount: number;
  types: Record<string, number>;
  blocks: BlockSummary[];
  coverage: {
    roomsWithData: number;
    totalRooms: number;
    pct: number;
  };
  /** day → 10 slot percentages of lecture rooms with a booking */
  timetableCoveragePct: Record<DayName, number[]>;
  insertsLast5m: number;
  /** minute (ISO, seconds zeroed) → records */
  insertsPerMinute: Record<string, number>;
  insertRatePerMinute: number;
  generatedAt: string;
};

/** level > partial → Partial, level >= full → Full */
export type StatusThresholds = {
  partial: number;
  full: number;
};

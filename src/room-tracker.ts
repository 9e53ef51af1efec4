import {
  ConfigurationError,
  InvalidProvenanceError,
  NoOpenRoomError,
  RoomAlreadyOpenError,
  UnknownPersonError,
} from "./errors";
import type { Person, Room, RoomStatus } from "./types";

export type RoomTracker = {
  openRoom: (roomId: string, participants: Iterable<Person>) => Room;
  closeRoom: () => Room;
  currentRoom: () => Room | null;
  allPersons: () => Person[];
  isKnownPerson: (person: Person) => boolean;
  hasRoom: (roomId: string) => boolean;
  rooms: () => Room[];
};

type RoomRecord = {
  roomId: string;
  participants: readonly Person[];
  status: RoomStatus;
};

// Keeps first occurrence order so prompts list people the way the caller declared them.
export const dedupePersons = (persons: Iterable<Person>): Person[] => Array.from(new Set(persons));

const toRoom = (record: RoomRecord): Room => Object.freeze({ ...record });

export const createRoomTracker = (params: { allPersons: Iterable<Person> }): RoomTracker => {
  const universe = dedupePersons(params.allPersons);
  if (!universe.length) {
    throw new ConfigurationError("At least one person is required");
  }
  const known = new Set(universe);
  const records: RoomRecord[] = [];
  const byId = new Map<string, RoomRecord>();
  let open: RoomRecord | null = null;

  const openRoom = (roomId: string, participants: Iterable<Person>) => {
    if (open) {
      throw new RoomAlreadyOpenError(open.roomId, roomId);
    }
    if (!roomId.trim()) {
      throw new InvalidProvenanceError("Room id must not be empty");
    }
    if (byId.has(roomId)) {
      throw new InvalidProvenanceError(`Room "${roomId}" was already used and cannot be reopened`);
    }
    const members = dedupePersons(participants);
    if (!members.length) {
      throw new InvalidProvenanceError(`Room "${roomId}" needs at least one participant`);
    }
    const stranger = members.find((person) => !known.has(person));
    if (stranger !== undefined) {
      throw new UnknownPersonError(stranger);
    }

    const record: RoomRecord = { roomId, participants: Object.freeze(members), status: "open" };
    records.push(record);
    byId.set(roomId, record);
    open = record;
    return toRoom(record);
  };

  const closeRoom = () => {
    if (!open) {
      throw new NoOpenRoomError("closeRoom");
    }
    open.status = "closed";
    const closed = toRoom(open);
    open = null;
    return closed;
  };

  return {
    openRoom,
    closeRoom,
    currentRoom: () => (open ? toRoom(open) : null),
    allPersons: () => [...universe],
    isKnownPerson: (person) => known.has(person),
    hasRoom: (roomId) => byId.has(roomId),
    rooms: () => records.map(toRoom),
  };
};

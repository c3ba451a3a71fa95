import { z } from 'zod';

const membershipSchema = z.enum(['invite', 'join', 'leave', 'ban', 'knock']);

export type Membership = z.infer<typeof membershipSchema>;

const baseEventSchema = z.object({
  type: z.string().min(1),
  sender: z.string(),
  room_id: z.string().optional(),
  event_id: z.string().optional(),
});

const memberEventSchema = baseEventSchema.extend({
  type: z.literal('m.room.member'),
  room_id: z.string().min(1),
  state_key: z.string(),
  content: z
    .object({
      membership: membershipSchema,
      displayname: z.string().nullish(),
      reason: z.string().optional(),
    })
    .passthrough(),
});

export type RoomEvent =
  | {
      kind: 'membership';
      roomId: string;
      sender: string;
      stateKey: string;
      membership: Membership;
      eventId?: string;
    }
  | {
      kind: 'unrecognized';
      type: string;
      roomId?: string;
      eventId?: string;
    };

export type ClassifiedEvent = { ok: true; event: RoomEvent } | { ok: false; reason: string };

const describeIssues = (error: z.ZodError) =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

/** Reads one serialized room event into a known shape. */
export const classifyEvent = (raw: unknown): ClassifiedEvent => {
  const base = baseEventSchema.safeParse(raw);
  if (!base.success) {
    return { ok: false, reason: describeIssues(base.error) };
  }

  if (base.data.type !== 'm.room.member') {
    return {
      ok: true,
      event: {
        kind: 'unrecognized',
        type: base.data.type,
        roomId: base.data.room_id,
        eventId: base.data.event_id,
      },
    };
  }

  const member = memberEventSchema.safeParse(raw);
  if (!member.success) {
    return { ok: false, reason: describeIssues(member.error) };
  }

  return {
    ok: true,
    event: {
      kind: 'membership',
      roomId: member.data.room_id,
      sender: member.data.sender,
      stateKey: member.data.state_key,
      membership: member.data.content.membership,
      eventId: member.data.event_id,
    },
  };
};

export type MembershipEvent = Extract<RoomEvent, { kind: 'membership' }>;

export const isInviteFor = (event: MembershipEvent, userId: string) =>
  event.membership === 'invite' && event.stateKey === userId;

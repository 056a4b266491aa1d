// src/db/schema.ts
import { serial, text, timestamp, varchar, integer, uuid, bigserial, jsonb, index, pgSchema } from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';
import { TICKET_STATUSES, TICKET_PRIORITIES } from '../domain/tickets/types';
import type { EventPayload } from '../domain/tickets/events';

export const supportDeskSchema = pgSchema('support_desk');

// --- Enums ---
export const ticketStatusEnum = supportDeskSchema.enum('ticket_status_enum', TICKET_STATUSES);
export const ticketPriorityEnum = supportDeskSchema.enum('ticket_priority_enum', TICKET_PRIORITIES);
export const userRoleEnum = supportDeskSchema.enum('user_role', ['admin', 'agent', 'customer']);

// --- Users (owned by the identity service; read here for roles and notifications) ---
export const users = supportDeskSchema.table('users', {
  id: uuid('id').primaryKey().defaultRandom(),
  email: varchar('email', { length: 255 }).notNull().unique(),
  fullName: varchar('full_name', { length: 255 }).notNull(),
  role: userRoleEnum('role').default('customer').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});

export const tickets = supportDeskSchema.table('tickets', {
  id: serial('id').primaryKey(),
  title: varchar('title', { length: 255 }).notNull(),
  description: text('description').default('').notNull(),
  status: ticketStatusEnum('status').default('OPEN').notNull(),
  priority: ticketPriorityEnum('priority').default('MEDIUM').notNull(),
  requesterId: uuid('requester_id').notNull().references(() => users.id),
  assigneeId: uuid('assignee_id').references(() => users.id, { onDelete: 'set null' }),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }),
  closedAt: timestamp('closed_at', { withTimezone: true }),
}, (table) => {
  return {
    requesterIndex: index('idx_tickets_requester_id').on(table.requesterId),
    assigneeIndex: index('idx_tickets_assignee_id').on(table.assigneeId),
    statusCreatedAtIndex: index('idx_tickets_status_created_at').on(table.status, table.createdAt),
  };
});

export const ticketComments = supportDeskSchema.table('ticket_comments', {
  id: serial('id').primaryKey(),
  ticketId: integer('ticket_id').notNull().references(() => tickets.id, { onDelete: 'cascade' }),
  authorId: uuid('author_id').notNull().references(() => users.id),
  body: text('body').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => {
  return {
    ticketCreatedAtIndex: index('idx_ticket_comments_ticket_created_at').on(table.ticketId, table.createdAt),
  };
});

// --- Append-only event log. Rows are inserted in the same transaction as the change they describe. ---
export const ticketEvents = supportDeskSchema.table('ticket_events', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  ticketId: integer('ticket_id').notNull().references(() => tickets.id, { onDelete: 'cascade' }),
  type: varchar('type', { length: 32 }).notNull(),
  payload: jsonb('payload').$type<EventPayload>().notNull(),
  actorId: uuid('actor_id').notNull().references(() => users.id),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => {
  return {
    // Serves the catch-up query: WHERE ticket_id = $1 AND id > $2 ORDER BY id
    ticketIdIdIndex: index('idx_ticket_events_ticket_id_id').on(table.ticketId, table.id),
  };
});

// --- Relations ---
export const ticketsRelations = relations(tickets, ({ one, many }) => ({
  requester: one(users, { fields: [tickets.requesterId], references: [users.id], relationName: 'requester' }),
  assignee: one(users, { fields: [tickets.assigneeId], references: [users.id], relationName: 'assignee' }),
  comments: many(ticketComments),
  events: many(ticketEvents),
}));

export const ticketCommentsRelations = relations(ticketComments, ({ one }) => ({
  ticket: one(tickets, { fields: [ticketComments.ticketId], references: [tickets.id] }),
  author: one(users, { fields: [ticketComments.authorId], references: [users.id] }),
}));

export const ticketEventsRelations = relations(ticketEvents, ({ one }) => ({
  ticket: one(tickets, { fields: [ticketEvents.ticketId], references: [tickets.id] }),
}));

export const usersRelations = relations(users, ({ many }) => ({
  requestedTickets: many(tickets, { relationName: 'requester' }),
  assignedTickets: many(tickets, { relationName: 'assignee' }),
}));

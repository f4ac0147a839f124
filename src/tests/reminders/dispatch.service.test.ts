/**
 * Reminder Dispatch Tests
 * Selection → suppression → rendering → batched send → status rows
 */

import { describe, it, expect, vi } from 'vitest';
import { ReminderDispatcher, createChunks } from '../../services/reminders/dispatch.service.js';
import { SuppressionEvaluator } from '../../services/reminders/suppression.service.js';
import { InMemoryReminderRepository, type SeedData } from '../helpers/inMemoryReminderRepository.js';
import { RecordingMailer } from '../helpers/recordingMailer.js';
import {
  createClient,
  createDefinition,
  createReminderType,
  createTemplate,
} from '../helpers/factories.js';
import type { Client } from '../../types/reminder.js';

// Deadline 30 days out: first stage of [30, 14, 3, 0]
const TODAY = '2025-03-01';
const DEADLINE = '2025-03-31';

function clients(count: number): Client[] {
  return Array.from({ length: count }, (_value, i) =>
    createClient({ id: i + 1, firstName: `Client${i + 1}`, email: `client${i + 1}@example.com` })
  );
}

function groupRepository(members: Client[], overrides: SeedData = {}): InMemoryReminderRepository {
  return new InMemoryReminderRepository({
    definitions: [
      createDefinition({ reminderId: 10, deadline: DEADLINE, receiver: { type: 'group', id: 7 } }),
    ],
    clients: members,
    groups: { 7: members.map((client) => client.id) },
    reminderTypes: [createReminderType()],
    templates: [createTemplate()],
    ...overrides,
  });
}

describe('Reminder Dispatcher', () => {
  it('should send one batch for a group of three eligible clients', async () => {
    const repository = groupRepository(clients(3));
    const mailer = new RecordingMailer();

    const summary = await new ReminderDispatcher({ repository, mailer }).processReminders(TODAY);

    expect(mailer.batches).toHaveLength(1);
    expect(mailer.batches[0]).toHaveLength(3);
    expect(repository.statusesFor('sent').map((row) => [row.reminderId, row.clientId])).toEqual([
      [10, 1],
      [10, 2],
      [10, 3],
    ]);
    expect(summary).toEqual({ successCount: 3, errorCount: 0 });
  });

  it('should personalize each outbound email', async () => {
    const repository = groupRepository([
      createClient({ id: 1, firstName: 'Ann', middleName: 'Marie', lastName: 'Lee', email: 'ann@example.com' }),
    ]);
    const mailer = new RecordingMailer();

    await new ReminderDispatcher({ repository, mailer }).processReminders(TODAY);

    expect(mailer.batches[0]).toEqual([
      {
        toEmail: 'ann@example.com',
        toName: 'Ann Marie Lee',
        subject: 'GST Filing due on 2025-03-31',
        html: 'Hi Ann, 30 days left',
      },
    ]);
  });

  it('should record an error for a client without email and never send', async () => {
    const repository = groupRepository([createClient({ id: 1, email: null })]);
    const mailer = new RecordingMailer();

    const summary = await new ReminderDispatcher({ repository, mailer }).processReminders(TODAY);

    expect(mailer.batches).toHaveLength(0);
    expect(repository.statuses).toEqual([
      { reminderId: 10, clientId: 1, status: 'error', errorMessage: 'No email address' },
    ]);
    expect(summary).toEqual({ successCount: 0, errorCount: 1 });
  });

  it('should record blocked and unsubscribed clients without counting errors', async () => {
    const repository = groupRepository(clients(3), {
      blocklist: [1],
      unsubscribes: [{ reminderId: 10, clientId: 2 }],
    });
    const mailer = new RecordingMailer();

    const summary = await new ReminderDispatcher({ repository, mailer }).processReminders(TODAY);

    expect(repository.statuses).toEqual([
      { reminderId: 10, clientId: 1, status: 'blocked', errorMessage: 'Client in blocklist' },
      { reminderId: 10, clientId: 2, status: 'unsubscribed', errorMessage: 'Client unsubscribed' },
      { reminderId: 10, clientId: 3, status: 'sent', errorMessage: null },
    ]);
    expect(mailer.batches[0].map((email) => email.toEmail)).toEqual(['client3@example.com']);
    expect(summary).toEqual({ successCount: 1, errorCount: 0 });
  });

  it('should never send to a blocklisted client across reminders', async () => {
    const members = clients(1);
    const repository = groupRepository(members, {
      definitions: [
        createDefinition({ reminderId: 10, deadline: DEADLINE, receiver: { type: 'individual', id: 1 } }),
        createDefinition({ reminderId: 11, deadline: TODAY, daysBeforeDeadline: [0], receiver: { type: 'individual', id: 1 } }),
      ],
      blocklist: [1],
    });
    const mailer = new RecordingMailer();

    await new ReminderDispatcher({ repository, mailer }).processReminders(TODAY);

    expect(mailer.batches).toHaveLength(0);
    expect(repository.statusesFor('blocked').map((row) => row.reminderId)).toEqual([10, 11]);
  });

  it('should not send again when re-run on the same day', async () => {
    const repository = groupRepository(clients(2));
    const mailer = new RecordingMailer();
    const dispatcher = new ReminderDispatcher({ repository, mailer });

    await dispatcher.processReminders(TODAY);
    const second = await dispatcher.processReminders(TODAY);

    expect(repository.statusesFor('sent')).toHaveLength(2);
    expect(mailer.batches).toHaveLength(1);
    expect(second).toEqual({ successCount: 0, errorCount: 0 });
  });

  it('should send exactly 100 pending emails as one batch', async () => {
    const repository = groupRepository(clients(100));
    const mailer = new RecordingMailer();

    await new ReminderDispatcher({ repository, mailer }).processReminders(TODAY);

    expect(mailer.batches.map((batch) => batch.length)).toEqual([100]);
  });

  it('should split 101 pending emails into batches of 100 and 1', async () => {
    const repository = groupRepository(clients(101));
    const mailer = new RecordingMailer();

    const summary = await new ReminderDispatcher({ repository, mailer }).processReminders(TODAY);

    expect(mailer.batches.map((batch) => batch.length)).toEqual([100, 1]);
    expect(summary.successCount).toBe(101);
  });

  it('should record errors for a failed batch and keep sending the rest', async () => {
    const repository = groupRepository(clients(3));
    let call = 0;
    const mailer = new RecordingMailer((emails) =>
      ++call === 1
        ? { success: false, error: 'HTTP 422: Invalid `to` field' }
        : { success: true, messageIds: emails.map((_email, i) => `id-${i}`) }
    );

    const summary = await new ReminderDispatcher({ repository, mailer, batchSize: 2 }).processReminders(TODAY);

    expect(repository.statuses).toEqual([
      { reminderId: 10, clientId: 1, status: 'error', errorMessage: 'HTTP 422: Invalid `to` field' },
      { reminderId: 10, clientId: 2, status: 'error', errorMessage: 'HTTP 422: Invalid `to` field' },
      { reminderId: 10, clientId: 3, status: 'sent', errorMessage: null },
    ]);
    expect(summary).toEqual({ successCount: 1, errorCount: 2 });
  });

  it('should treat a throwing mailer as a failed batch without aborting the run', async () => {
    const repository = groupRepository(clients(2));
    const mailer = new RecordingMailer();
    vi.spyOn(mailer, 'sendBatch').mockRejectedValue(new Error('socket hang up'));

    const summary = await new ReminderDispatcher({ repository, mailer }).processReminders(TODAY);

    expect(repository.statusesFor('error').map((row) => row.errorMessage)).toEqual([
      'socket hang up',
      'socket hang up',
    ]);
    expect(summary).toEqual({ successCount: 0, errorCount: 2 });
  });

  it('should skip a recipient silently when a suppression check fails', async () => {
    const repository = groupRepository(clients(2));
    vi.spyOn(repository, 'isBlocklisted').mockImplementation(async (clientId) => {
      if (clientId === 1) throw new Error('query timeout');
      return false;
    });
    const mailer = new RecordingMailer();

    const summary = await new ReminderDispatcher({ repository, mailer }).processReminders(TODAY);

    expect(repository.statuses).toEqual([
      { reminderId: 10, clientId: 2, status: 'sent', errorMessage: null },
    ]);
    expect(summary).toEqual({ successCount: 1, errorCount: 0 });
  });

  it('should finish the run when status rows cannot be written', async () => {
    const repository = groupRepository(clients(1));
    vi.spyOn(repository, 'insertStatuses').mockRejectedValue(new Error('read-only transaction'));
    const mailer = new RecordingMailer();

    const summary = await new ReminderDispatcher({ repository, mailer }).processReminders(TODAY);

    expect(mailer.batches).toHaveLength(1);
    expect(summary).toEqual({ successCount: 1, errorCount: 0 });
  });

  it('should record an error and keep going when a recipient cannot be evaluated', async () => {
    const repository = groupRepository(clients(2));
    const mailer = new RecordingMailer();
    const evaluator = new SuppressionEvaluator(repository);
    const evaluate = evaluator.evaluate.bind(evaluator);
    vi.spyOn(evaluator, 'evaluate').mockImplementation(async (client, reminder) => {
      if (client.id === 1) throw new Error('connection reset');
      return evaluate(client, reminder);
    });

    const summary = await new ReminderDispatcher({ repository, mailer, evaluator }).processReminders(
      TODAY
    );

    expect(repository.statuses).toEqual([
      { reminderId: 10, clientId: 1, status: 'error', errorMessage: 'connection reset' },
      { reminderId: 10, clientId: 2, status: 'sent', errorMessage: null },
    ]);
    expect(mailer.batches.map((batch) => batch.map((email) => email.toEmail))).toEqual([
      ['client2@example.com'],
    ]);
    expect(summary).toEqual({ successCount: 1, errorCount: 1 });
  });

  it('should do nothing when no reminder is due', async () => {
    const repository = groupRepository(clients(2));
    const mailer = new RecordingMailer();

    const summary = await new ReminderDispatcher({ repository, mailer }).processReminders('2025-03-02');

    expect(mailer.batches).toHaveLength(0);
    expect(repository.statuses).toEqual([]);
    expect(summary).toEqual({ successCount: 0, errorCount: 0 });
  });
});

describe('createChunks', () => {
  it('should split items into fixed-size chunks', () => {
    expect(createChunks([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(createChunks([], 100)).toEqual([]);
  });

  it('should reject a non-positive chunk size', () => {
    expect(() => createChunks([1], 0)).toThrow(RangeError);
  });
});

import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('reminders', (table) => {
    // One reminder per task; the task owns it
    table.uuid('task_id').primary().references('id').inTable('tasks').onDelete('CASCADE');
    table.uuid('user_id').notNullable().references('id').inTable('users').onDelete('CASCADE').index();
    table.timestamp('due_at').notNullable().index();
    table
      .enum('state', ['disabled', 'pending', 'sent', 'failed'])
      .notNullable()
      .defaultTo('pending')
      .index();
    table.string('destination');
    table.integer('attempts').notNullable().defaultTo(0);
    table.text('last_error');
    table.timestamp('sent_at');
    table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
    table.timestamp('updated_at').notNullable().defaultTo(knex.fn.now());
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTable('reminders');
}

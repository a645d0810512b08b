import type { Pool } from 'pg';

export async function ensureSchema(db: Pool) {
  await db.query(`
    create table if not exists games (
      id text primary key,
      player1_id text not null,
      player2_id text,
      status text not null check (status in ('waiting', 'in_progress', 'finished', 'draw')),
      board jsonb not null,
      current_turn char(1) not null check (current_turn in ('X', 'O')),
      winner_id text,
      version integer not null default 0,
      created_at timestamptz not null default now(),
      updated_at timestamptz not null default now(),
      finished_at timestamptz,
      check (status <> 'waiting' or player2_id is null),
      check (status <> 'finished' or winner_id is not null)
    );

    create index if not exists idx_games_status on games(status);
    create index if not exists idx_games_created_at on games(created_at desc);
    create index if not exists idx_games_player1 on games(player1_id);
    create index if not exists idx_games_player2 on games(player2_id);

    create table if not exists moves (
      id text primary key,
      game_id text not null references games(id) on delete cascade,
      player_id text not null,
      position smallint not null check (position between 0 and 8),
      symbol char(1) not null check (symbol in ('X', 'O')),
      move_number smallint not null check (move_number between 1 and 9),
      created_at timestamptz not null default now()
    );

    -- a cell is written at most once per game, and the log has no gaps or duplicates
    create unique index if not exists ux_moves_game_position on moves(game_id, position);
    create unique index if not exists ux_moves_game_number on moves(game_id, move_number);
  `);
}

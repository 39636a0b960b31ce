/**
 * Help command: shows users what the bot can do.
 */

export function getHelpMessage(): string {
  return [
    '👋 Hi! I check in with you a few times a day and keep a log of your answers.',
    '',
    'Just reply to my questions. Anything you send me is saved to your log.',
    '',
    'Settings',
    '  /settings — show your current settings',
    '  /window 09:00-22:00 — when I may message you',
    '  /freq 120 — minutes between check-ins (30-1440)',
    '  /notify_on, /notify_off — pause or resume check-ins',
    '',
    'Questions',
    '  /questions — list your active questions',
    '  /question_add name | 09:00-18:00 | 180 | text',
    '  /templates [category or search] — ready-made questions',
    '  /template_add key [| 09:00-18:00 | 180]',
    '  /question_edit id new text',
    '  /question_toggle id',
    '  /question_delete id',
    '  Use {name} and {time} in question text.',
    '',
    'Log',
    '  /history — your last 10 entries',
  ].join('\n');
}

export function getAdminHelpMessage(): string {
  return [
    'Admin',
    '  /broadcast text — message every enabled user',
    '  /broadcast_preview text — recipients and estimated time',
    '  /broadcast_test text — send the broadcast to yourself only',
    '  /stats — user and activity totals',
  ].join('\n');
}

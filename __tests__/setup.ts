/**
 * Jest Test Setup
 *
 * This file runs before all tests to configure the testing environment.
 */

// Keep tracker logs out of test output; replay tests capture their own
process.env.LOG_LEVEL = 'error';

// Config tests set these explicitly
delete process.env.SPEC_TIMERS_CONFIG;
delete process.env.SPEC_TIMERS_REGEN_FORMAT;
delete process.env.SPEC_TIMERS_COOLDOWN_FORMAT;
delete process.env.SPEC_TIMERS_SHOW_REGEN;
delete process.env.SPEC_TIMERS_SHOW_COOLDOWN;

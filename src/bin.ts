#!/usr/bin/env node
import { main } from './n3quads';

main();

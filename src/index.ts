#!/usr/bin/env node

import * as dotenv from 'dotenv';
import { createProgram } from './cli.js';

dotenv.config();

createProgram().parse();

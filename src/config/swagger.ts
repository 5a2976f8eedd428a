import swaggerJsdoc from 'swagger-jsdoc';
import path from 'path';

const options: swaggerJsdoc.Options = {
    definition: {
        openapi: '3.0.0',
        info: {
            title: 'School Portal',
            version: '1.0.0',
            description: 'HTML routes of the school portal. Forms are posted as application/x-www-form-urlencoded; pages are returned as text/html.',
            license: {
                name: 'MIT',
                url: 'https://opensource.org/licenses/MIT'
            }
        },
        servers: [
            {
                url: '/',
                description: 'This server'
            }
        ],
        components: {
            securitySchemes: {
                cookieAuth: {
                    type: 'apiKey',
                    in: 'cookie',
                    name: 'session'
                }
            },
            schemas: {
                LoginForm: {
                    type: 'object',
                    required: ['username', 'password'],
                    properties: {
                        username: {
                            type: 'string',
                            example: 'student1'
                        },
                        password: {
                            type: 'string',
                            format: 'password'
                        }
                    }
                },
                ClassForm: {
                    type: 'object',
                    required: ['class_name', 'room', 'time', 'day', 'teacher'],
                    properties: {
                        class_name: { type: 'string', example: 'Mathematics' },
                        room: { type: 'string', example: 'Room 101' },
                        time: { type: 'string', example: '09:00 AM' },
                        day: { type: 'string', example: 'Monday' },
                        teacher: { type: 'string', example: 'Ms. Smith' }
                    }
                },
                AttendanceForm: {
                    type: 'object',
                    required: ['student_name', 'class_name', 'date', 'status'],
                    properties: {
                        student_name: { type: 'string' },
                        class_name: { type: 'string' },
                        date: { type: 'string', format: 'date' },
                        status: { type: 'string', enum: ['present', 'absent'] }
                    }
                },
                AssignmentForm: {
                    type: 'object',
                    required: ['title', 'description', 'due_date', 'link'],
                    properties: {
                        title: { type: 'string' },
                        description: { type: 'string' },
                        due_date: { type: 'string', format: 'date' },
                        link: { type: 'string', format: 'uri' }
                    }
                },
                EventForm: {
                    type: 'object',
                    required: ['event_name', 'event_date', 'description'],
                    properties: {
                        event_name: { type: 'string' },
                        event_date: { type: 'string', format: 'date' },
                        description: { type: 'string' }
                    }
                }
            }
        },
        security: [{
            cookieAuth: []
        }]
    },
    // works from src/ (ts) and dist/ (compiled js)
    apis: [path.join(__dirname, '../routes/*.{ts,js}')],
};

export const swaggerSpec = swaggerJsdoc(options);
